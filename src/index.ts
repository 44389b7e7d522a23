import express from 'express';
import http from 'http';
import path from 'path';
import cors from 'cors';
import { createApp } from './api/app';
import { createWsServer } from './api/ws';
import { FlashMonitor } from './core/FlashMonitor';
import { acquireInstanceLock, InstanceLock } from './core/instanceLock';
import { EServerBusy } from './core/errors';
import { MonitorSettingsStore } from './storage/MonitorSettingsStore';

const PORT = (() => {
  const n = Number(String(process.env.PORT || '').trim());
  if (Number.isFinite(n) && n > 0) return n;
  return 9001;
})();

function hasErrorCode(e: unknown, code: string): boolean {
  return !!e && typeof e === 'object' && 'code' in e && e.code === code;
}

async function main() {
  const defaultDataDir = path.resolve(__dirname, '..', 'data');
  const dataDir = (process.env.DATA_DIR && String(process.env.DATA_DIR).trim()) || defaultDataDir;
  const lock: InstanceLock = acquireInstanceLock(path.join(dataDir, 'server.lock.json'));

  const settingsStore = new MonitorSettingsStore(path.join(dataDir, 'monitor.settings.json'));
  const settings = await settingsStore.read();
  console.log(`[Main] Settings loaded: baud=${settings.defaultBaudRate}, duration=${settings.totalDurationMs}ms, tick=${settings.tickIntervalMs}ms`);

  const monitor = new FlashMonitor({
    settings,
    logLines: process.env.MONITOR_LINE_LOG === '1'
  });

  const app = createApp(monitor, settingsStore);

  const mainApp = express();
  mainApp.use(cors());
  mainApp.get('/health', (_req, res) => {
    res.status(200).json({ ok: true, pid: process.pid, port: PORT, boards: monitor.list().length });
  });
  mainApp.use('/api', app);

  const server = http.createServer(mainApp);
  const wss = createWsServer(server, monitor);

  let exiting = false;
  async function gracefulExit(code: number) {
    if (exiting) return;
    exiting = true;
    console.log('Stopping server...');
    // 等所有读循环退出、串口释放后再退出进程
    await monitor.stopAll();
    wss.close();
    lock.release();
    server.close(() => {
      console.log('Server stopped');
      process.exit(code);
    });
  }

  server.on('error', (err) => {
    if (hasErrorCode(err, 'EADDRINUSE')) console.error(`PORT_IN_USE:${PORT}`);
    else console.error(err);
    gracefulExit(hasErrorCode(err, 'EADDRINUSE') ? 110 : 1).catch((e) => {
      console.error('Shutdown failed:', e);
      process.exit(1);
    });
  });

  server.listen(PORT, () => {
    console.log(`Server is running on http://localhost:${PORT}`);
    console.log(`WebSocket server is running on ws://localhost:${PORT}/ws`);
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      gracefulExit(0).catch((e) => {
        console.error('Shutdown failed:', e);
        process.exit(1);
      });
    });
  }
}

main().catch((e) => {
  if (e instanceof EServerBusy) {
    const pidPart = Number.isFinite(Number(e.lockedPid)) ? ` pid=${e.lockedPid}` : '';
    console.error(`EServerBusy:${pidPart} ${e.message}`);
    process.exit(110);
  }
  console.error(e);
  process.exit(1);
});
