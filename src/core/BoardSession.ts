import {
  Board,
  BoardEvent,
  BoardSnapshot,
  BoardState,
  FlashedSource
} from '../types/board';
import { COMPLETION_MARKER, isCompletionLine } from './completion';
import { formatElapsed } from './elapsed';
import { errorMessage, PortIOError, PortOpenError } from './errors';
import { DecodedLine, LineDecoder } from './lineDecoder';
import { DEFAULT_TICK_INTERVAL_MS, DEFAULT_TOTAL_DURATION_MS, ProgressEstimator } from './ProgressEstimator';
import { Cancel, Scheduler, systemScheduler } from './scheduler';
import { SerialChannel } from './SerialPortChannel';

export interface BoardSessionTiming {
  pollIntervalMs: number;
  totalDurationMs: number;
  tickIntervalMs: number;
  displayIntervalMs: number;
}

export interface BoardSessionOptions {
  board: Board;
  openChannel: (board: Board) => SerialChannel;
  emit: (event: BoardEvent) => void;
  scheduler?: Scheduler;
  timing?: Partial<BoardSessionTiming>;
  completionMarker?: string;
  maxLineBytes?: number;
  logLines?: boolean;
}

export const DEFAULT_TIMING: BoardSessionTiming = {
  pollIntervalMs: 100,
  totalDurationMs: DEFAULT_TOTAL_DURATION_MS,
  tickIntervalMs: DEFAULT_TICK_INTERVAL_MS,
  // 约 30 Hz，足够人眼观察
  displayIntervalMs: 33
};

// 结束态只能再进入 terminated
const SETTLED_STATES: ReadonlySet<BoardState> = new Set<BoardState>(['flashed', 'timedOut', 'errored']);

/**
 * 单板监控会话：独占一个串口，轮询读取设备输出，识别完成标志并估算进度。
 *
 * 状态：idle → listening → active → flashed | timedOut | errored → terminated
 * 所有事件按产生顺序同步交给 emit；stop() 之后不再产生任何事件。
 */
export class BoardSession {
  public readonly board: Board;
  private readonly openChannel: (board: Board) => SerialChannel;
  private readonly sink: (event: BoardEvent) => void;
  private readonly scheduler: Scheduler;
  private readonly timing: BoardSessionTiming;
  private readonly marker: string;
  private readonly decoder: LineDecoder;
  private readonly estimator: ProgressEstimator;
  private readonly abort = new AbortController();
  private readonly logLines: boolean;

  private currentState: BoardState = 'idle';
  private loop: Promise<void> | null = null;
  private stopRequested = false;
  private readerDone = false;
  private flashedLatched = false;
  private elapsedStartedAt: number | null = null;
  private elapsedFrozenMs: number | null = null;
  private cancelDisplay: Cancel | null = null;
  private lineCount = 0;
  private firstTransmissionAt?: number;
  private flashedAt?: number;
  private flashedBy?: FlashedSource;
  private lastError?: string;

  constructor(opts: BoardSessionOptions) {
    this.board = opts.board;
    this.openChannel = opts.openChannel;
    this.sink = opts.emit;
    this.scheduler = opts.scheduler ?? systemScheduler;
    this.timing = { ...DEFAULT_TIMING, ...(opts.timing || {}) };
    this.marker = opts.completionMarker ?? COMPLETION_MARKER;
    this.decoder = new LineDecoder({ maxLineBytes: opts.maxLineBytes });
    this.logLines = !!opts.logLines;
    this.estimator = new ProgressEstimator({
      scheduler: this.scheduler,
      totalDurationMs: this.timing.totalDurationMs,
      tickIntervalMs: this.timing.tickIntervalMs,
      onProgress: (percent) => this.emit({ type: 'progress', boardId: this.board.id, percent }),
      onComplete: () => this.handleEstimatorComplete()
    });
  }

  public get state(): BoardState {
    return this.currentState;
  }

  public get progressPercent(): number {
    return this.estimator.percent;
  }

  public get running(): boolean {
    return this.loop !== null && !this.stopRequested && !this.readerDone;
  }

  public elapsedMs(): number {
    if (this.elapsedFrozenMs !== null) return this.elapsedFrozenMs;
    if (this.elapsedStartedAt === null) return 0;
    return Math.max(0, this.scheduler.now() - this.elapsedStartedAt);
  }

  public snapshot(): BoardSnapshot {
    const elapsedMs = this.elapsedMs();
    return {
      id: this.board.id,
      path: this.board.path,
      baudRate: this.board.baudRate,
      state: this.currentState,
      progressPercent: this.estimator.percent,
      elapsedMs,
      elapsedText: formatElapsed(elapsedMs),
      lineCount: this.lineCount,
      firstTransmissionAt: this.firstTransmissionAt,
      flashedAt: this.flashedAt,
      flashedBy: this.flashedBy,
      lastError: this.lastError
    };
  }

  /**
   * 打开串口并启动轮询循环；重复调用无效。
   */
  public start(): void {
    if (this.loop || this.stopRequested) return;
    this.loop = this.run();
  }

  /**
   * 请求停止并等待读循环退出、串口释放。可重复调用。
   */
  public async stop(): Promise<void> {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.abort.abort();
      this.stopTimers();
      this.setState('terminated');
    }
    if (this.loop) await this.loop;
  }

  /**
   * 读循环结束（出错、计时完成或被停止）时 resolve。
   */
  public whenSettled(): Promise<void> {
    return this.loop ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    let channel: SerialChannel | null = null;
    let opened = false;
    try {
      channel = this.openChannel(this.board);
      await channel.open();
      opened = true;
      if (this.stopRequested) return;
      this.setState('listening');

      while (!this.stopRequested && !this.readerDone) {
        const chunk = channel.pollAvailable();
        if (chunk.length > 0) this.handleChunk(chunk);
        if (this.stopRequested || this.readerDone) break;
        await this.scheduler.sleep(this.timing.pollIntervalMs, this.abort.signal);
      }
    } catch (e) {
      this.fail(opened || e instanceof PortOpenError ? e : new PortOpenError(this.board.path, errorMessage(e)));
    } finally {
      this.readerDone = true;
      if (!this.stopRequested) this.drainTail();
      this.stopTimers();
      if (channel) await channel.close();
    }
  }

  private handleChunk(chunk: Buffer): void {
    for (const line of this.decoder.push(chunk)) {
      this.handleLine(line);
      if (this.stopRequested) return;
    }
  }

  private handleLine(line: DecodedLine): void {
    if (line.error) {
      this.emit({ type: 'decodeError', boardId: this.board.id, message: line.error.message });
    }

    if (this.firstTransmissionAt === undefined) {
      this.firstTransmissionAt = Date.now();
      this.emit({ type: 'firstTransmission', boardId: this.board.id });
      this.beginTiming();
      if (this.currentState === 'listening') this.setState('active');
    }

    this.deliverLine(line.text);

    if (!this.flashedLatched && isCompletionLine(line.text, this.marker)) {
      this.estimator.complete();
      this.markFlashed('marker');
      this.setState('flashed');
    }
  }

  private deliverLine(text: string): void {
    this.lineCount += 1;
    if (this.logLines) console.log(`[BoardSession] #${this.board.id} ${this.board.path}: ${text}`);
    this.emit({ type: 'line', boardId: this.board.id, text, receivedAt: Date.now() });
  }

  /**
   * 读循环因出错或计时完成而结束时，交出缓冲区里没有换行的最后一段。
   * 只作为普通行投递，不再启动计时，也不参与完成判定。
   */
  private drainTail(): void {
    const tail = this.decoder.flush();
    if (!tail) return;
    if (tail.error) {
      this.emit({ type: 'decodeError', boardId: this.board.id, message: tail.error.message });
    }
    this.deliverLine(tail.text);
  }

  private beginTiming(): void {
    this.elapsedStartedAt = this.scheduler.now();
    this.estimator.start();
    this.cancelDisplay = this.scheduler.every(this.timing.displayIntervalMs, () => {
      const elapsedMs = this.elapsedMs();
      this.emit({ type: 'elapsed', boardId: this.board.id, elapsedMs, text: formatElapsed(elapsedMs) });
    });
  }

  private handleEstimatorComplete(): void {
    if (this.stopRequested) return;
    if (!this.flashedLatched) {
      console.log(`[BoardSession] #${this.board.id} ${this.board.path}: estimated flash time elapsed`);
      this.markFlashed('timer');
      this.setState('timedOut');
    }
    // 计时完成后结束读取并释放串口
    this.readerDone = true;
    this.abort.abort();
  }

  private markFlashed(source: FlashedSource): void {
    this.flashedLatched = true;
    this.flashedAt = Date.now();
    this.flashedBy = source;
    this.freezeElapsed();
    this.emit({ type: 'flashed', boardId: this.board.id, source });
  }

  private fail(e: unknown): void {
    if (this.stopRequested) return;
    const err = e instanceof PortOpenError || e instanceof PortIOError
      ? e
      : new PortIOError(this.board.path, errorMessage(e));
    this.lastError = err.message;
    console.error(`[BoardSession] #${this.board.id} ${this.board.path} ${err.name}: ${err.message}`);
    this.stopTimers();
    this.emit({ type: 'portError', boardId: this.board.id, message: err.message });
    this.setState('errored');
  }

  private freezeElapsed(): void {
    if (this.elapsedFrozenMs === null) this.elapsedFrozenMs = this.elapsedMs();
    if (this.cancelDisplay) {
      this.cancelDisplay();
      this.cancelDisplay = null;
    }
  }

  private stopTimers(): void {
    this.estimator.stop();
    this.freezeElapsed();
  }

  private setState(next: BoardState): void {
    if (this.currentState === next) return;
    if (this.currentState === 'terminated') return;
    if (SETTLED_STATES.has(this.currentState) && next !== 'terminated') return;
    this.currentState = next;
    // terminated 是 stop 之后唯一放行的事件
    if (next === 'terminated') this.sink({ type: 'state', boardId: this.board.id, state: next });
    else this.emit({ type: 'state', boardId: this.board.id, state: next });
  }

  private emit(event: BoardEvent): void {
    if (this.stopRequested) return;
    this.sink(event);
  }
}
