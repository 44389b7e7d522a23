import { EventEmitter } from 'events';
import { Board, BoardEvent, BoardEventListener, BoardSnapshot } from '../types/board';
import { MonitorSettingsV1 } from '../types/settings';
import { PortInfo, PortListing } from '../types/serial';
import { getDefaultSettings, normalizeBaudRate } from '../storage/MonitorSettingsStore';
import { BoardSession } from './BoardSession';
import { listSerialPorts, PortFilterOptions } from './portDiscovery';
import { Scheduler, systemScheduler } from './scheduler';
import { SerialChannel, SerialPortChannel } from './SerialPortChannel';

export interface FlashMonitorOptions {
  openChannel?: (board: Board) => SerialChannel;
  listPorts?: (opts: PortFilterOptions) => Promise<PortInfo[]>;
  scheduler?: Scheduler;
  settings?: MonitorSettingsV1;
  logLines?: boolean;
}

const defaultOpenChannel = (board: Board): SerialChannel =>
  new SerialPortChannel({ path: board.path, baudRate: board.baudRate });

/**
 * 会话注册表：分配板号、启动/停止会话，并把所有会话的事件汇聚成单一的 'event' 流。
 *
 * 每块板一个独立的异步读循环，适合工位上同时接几块板的场景，不面向大规模设备群。
 */
export class FlashMonitor extends EventEmitter {
  private sessions: Map<number, BoardSession> = new Map();
  private nextId = 1;
  private settings: MonitorSettingsV1;
  private readonly openChannel: (board: Board) => SerialChannel;
  private readonly listPortsImpl: (opts: PortFilterOptions) => Promise<PortInfo[]>;
  private readonly scheduler: Scheduler;
  private readonly logLines: boolean;

  constructor(opts: FlashMonitorOptions = {}) {
    super();
    this.openChannel = opts.openChannel ?? defaultOpenChannel;
    this.listPortsImpl = opts.listPorts ?? listSerialPorts;
    this.scheduler = opts.scheduler ?? systemScheduler;
    this.settings = opts.settings ?? getDefaultSettings();
    this.logLines = !!opts.logLines;
  }

  public getSettings(): MonitorSettingsV1 {
    return this.settings;
  }

  /**
   * 新设置只对之后注册的会话生效。
   */
  public applySettings(next: MonitorSettingsV1): void {
    this.settings = next;
  }

  /**
   * StartBoard：分配新板号并立即启动会话。板号单调递增，进程内不复用。
   */
  public register(path: string, baudRate?: number): number {
    const id = this.nextId++;
    const board: Board = Object.freeze({
      id,
      path,
      baudRate: normalizeBaudRate(baudRate, this.settings.defaultBaudRate)
    });

    const session = new BoardSession({
      board,
      openChannel: this.openChannel,
      emit: (event) => this.dispatch(event),
      scheduler: this.scheduler,
      timing: {
        pollIntervalMs: this.settings.pollIntervalMs,
        totalDurationMs: this.settings.totalDurationMs,
        tickIntervalMs: this.settings.tickIntervalMs,
        displayIntervalMs: this.settings.displayIntervalMs
      },
      completionMarker: this.settings.completionMarker,
      maxLineBytes: this.settings.maxLineBytes,
      logLines: this.logLines
    });
    this.sessions.set(id, session);
    console.log(`[FlashMonitor] Board #${id} registered on ${path} @ ${board.baudRate}`);
    session.start();
    return id;
  }

  /**
   * 扫描当前接入的串口，为尚无活动会话的端口各注册一块板。
   */
  public async registerDiscovered(): Promise<number[]> {
    const ports = await this.listPortsImpl({ includeNativePorts: this.settings.includeNativePorts });
    const ids: number[] = [];
    for (const port of ports) {
      if (this.findLiveSession(port.path)) continue;
      ids.push(this.register(port.path));
    }
    return ids;
  }

  public async listPorts(): Promise<PortListing[]> {
    const ports = await this.listPortsImpl({ includeNativePorts: this.settings.includeNativePorts });
    return ports.map(p => {
      const owner = this.findLiveSession(p.path);
      return owner ? { ...p, busy: true, boardId: owner.board.id } : { ...p, busy: false };
    });
  }

  /**
   * StopBoard：停止会话并从注册表移除；未知板号返回 false。
   */
  public async stopBoard(boardId: number): Promise<boolean> {
    const session = this.sessions.get(boardId);
    if (!session) return false;
    this.sessions.delete(boardId);
    await session.stop();
    console.log(`[FlashMonitor] Board #${boardId} stopped.`);
    return true;
  }

  /**
   * StopAll：停止全部会话并等待各自读循环退出后才返回。
   */
  public async stopAll(): Promise<void> {
    const all = Array.from(this.sessions.values());
    this.sessions.clear();
    await Promise.all(all.map(s => s.stop()));
    if (all.length) console.log(`[FlashMonitor] ${all.length} board(s) stopped.`);
  }

  public get(boardId: number): BoardSnapshot | undefined {
    return this.sessions.get(boardId)?.snapshot();
  }

  public list(): BoardSnapshot[] {
    return Array.from(this.sessions.values(), s => s.snapshot());
  }

  public has(boardId: number): boolean {
    return this.sessions.has(boardId);
  }

  public subscribe(listener: BoardEventListener): () => void {
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }

  private findLiveSession(path: string): BoardSession | undefined {
    for (const s of this.sessions.values()) {
      if (s.board.path === path && s.running) return s;
    }
    return undefined;
  }

  private dispatch(event: BoardEvent): void {
    try {
      this.emit('event', event);
    } catch (e) {
      // 订阅者异常不能影响会话本身
      console.error(`[FlashMonitor] Listener failed on ${event.type} for board #${event.boardId}:`, e);
    }
  }
}
