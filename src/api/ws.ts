import { WebSocketServer, WebSocket, RawData } from 'ws';
import { Server } from 'http';
import { FlashMonitor } from '../core/FlashMonitor';
import { errorMessage } from '../core/errors';
import { BoardEvent, ElapsedEvent } from '../types/board';

type WsCommand =
  | { type: 'board:start'; path: string; baudRate?: number }
  | { type: 'board:stop'; boardId: number }
  | { type: 'board:stopAll' }
  | { type: 'board:scan' };

// 计时显示最多每 100ms 推送一次
const ELAPSED_BROADCAST_MS = 100;

export function parseCommand(raw: string): WsCommand | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return null;
  }
  if (!parsed || typeof parsed !== 'object' || !('type' in parsed)) return null;
  const msg: { type: unknown; path?: unknown; baudRate?: unknown; boardId?: unknown } = parsed;

  if (msg.type === 'board:start' && typeof msg.path === 'string' && msg.path.trim()) {
    const baud = Number(msg.baudRate);
    return { type: 'board:start', path: msg.path.trim(), baudRate: Number.isInteger(baud) && baud > 0 ? baud : undefined };
  }
  if (msg.type === 'board:stop') {
    const boardId = Number(msg.boardId);
    return Number.isInteger(boardId) && boardId > 0 ? { type: 'board:stop', boardId } : null;
  }
  if (msg.type === 'board:stopAll') return { type: 'board:stopAll' };
  if (msg.type === 'board:scan') return { type: 'board:scan' };
  return null;
}

export function toWireMessage(event: BoardEvent): Record<string, unknown> {
  const { type, ...payload } = event;
  return { type: `board:${type}`, ...payload };
}

export function createWsServer(server: Server, monitor: FlashMonitor) {
  const wss = new WebSocketServer({ server, path: '/ws' });

  const broadcast = (data: unknown) => {
    const msg = JSON.stringify(data);
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    });
  };

  const pendingElapsed: Map<number, ElapsedEvent> = new Map();
  let elapsedTimer: NodeJS.Timeout | null = null;

  const scheduleElapsedBroadcast = () => {
    if (elapsedTimer) return;
    elapsedTimer = setTimeout(() => {
      elapsedTimer = null;
      for (const ev of pendingElapsed.values()) broadcast(toWireMessage(ev));
      pendingElapsed.clear();
    }, ELAPSED_BROADCAST_MS);
  };

  console.log('[WS] Setting up FlashMonitor listeners...');
  const unsubscribe = monitor.subscribe((event) => {
    if (event.type === 'elapsed') {
      pendingElapsed.set(event.boardId, event);
      scheduleElapsedBroadcast();
      return;
    }
    if (event.type !== 'line' && event.type !== 'progress') {
      console.log(`[WS] Broadcasting board:${event.type} for #${event.boardId}`);
    }
    broadcast(toWireMessage(event));
  });

  const handleCommand = async (ws: WebSocket, cmd: WsCommand) => {
    const reply = (data: Record<string, unknown>) => {
      if (ws.readyState === WebSocket.OPEN) ws.send(JSON.stringify({ type: 'command:result', command: cmd.type, ...data }));
    };
    try {
      if (cmd.type === 'board:start') {
        reply({ ok: true, data: { boardId: monitor.register(cmd.path, cmd.baudRate) } });
      } else if (cmd.type === 'board:stop') {
        const stopped = await monitor.stopBoard(cmd.boardId);
        reply(stopped ? { ok: true } : { ok: false, error: `Board ${cmd.boardId} not found` });
      } else if (cmd.type === 'board:stopAll') {
        await monitor.stopAll();
        reply({ ok: true });
      } else {
        reply({ ok: true, data: { boardIds: await monitor.registerDiscovered() } });
      }
    } catch (e) {
      console.error(`[WS] ${cmd.type} failed:`, e);
      reply({ ok: false, error: errorMessage(e) });
    }
  };

  wss.on('connection', (ws) => {
    console.log('Client connected');
    ws.send(JSON.stringify({ type: 'boards:snapshot', data: monitor.list() }));

    ws.on('message', (message: RawData) => {
      const cmd = parseCommand(message.toString());
      if (!cmd) {
        console.warn('[WS] Invalid WS message ignored');
        return;
      }
      handleCommand(ws, cmd).catch((err) => {
        console.error('[WS] Command handling error:', err);
      });
    });

    ws.on('close', () => {
      console.log('Client disconnected');
    });
  });

  wss.on('close', () => {
    unsubscribe();
    if (elapsedTimer) clearTimeout(elapsedTimer);
    pendingElapsed.clear();
  });

  return wss;
}
