import express from 'express';
import cors from 'cors';
import { FlashMonitor } from '../core/FlashMonitor';
import { errorMessage } from '../core/errors';
import { MonitorSettingsStore, normalizeSettings } from '../storage/MonitorSettingsStore';

function field(body: unknown, key: string): unknown {
  if (!body || typeof body !== 'object') return undefined;
  return key in body ? Reflect.get(body, key) : undefined;
}

function parseBoardId(raw: unknown): number | null {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : null;
}

export function createApp(monitor: FlashMonitor, settingsStore?: MonitorSettingsStore) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // 1. 当前接入的串口（标记已被会话占用的端口）
  app.get('/ports', async (req, res) => {
    try {
      const ports = await monitor.listPorts();
      res.json({ code: 0, msg: 'success', data: ports });
    } catch (error) {
      res.status(500).json({ code: 500, msg: errorMessage(error) });
    }
  });

  // 2. 所有会话快照
  app.get('/boards', (req, res) => {
    res.json({ code: 0, msg: 'success', data: monitor.list() });
  });

  app.get('/boards/:id', (req, res) => {
    const id = parseBoardId(req.params.id);
    if (id === null) return res.status(400).json({ code: 400, msg: 'Invalid board id' });
    const snap = monitor.get(id);
    if (!snap) return res.status(404).json({ code: 404, msg: `Board ${id} not found` });
    res.json({ code: 0, msg: 'success', data: snap });
  });

  // 3. StartBoard
  app.post('/boards', (req, res) => {
    const path = field(req.body, 'path');
    const baudRate = field(req.body, 'baudRate');

    if (typeof path !== 'string' || !path.trim()) {
      return res.status(400).json({ code: 400, msg: 'Missing path' });
    }
    if (baudRate !== undefined && !(Number.isInteger(Number(baudRate)) && Number(baudRate) > 0)) {
      return res.status(400).json({ code: 400, msg: 'Invalid baudRate' });
    }

    const boardId = monitor.register(path.trim(), baudRate === undefined ? undefined : Number(baudRate));
    res.json({ code: 0, msg: 'success', data: { boardId } });
  });

  // 4. 扫描并为所有空闲端口注册
  app.post('/boards/scan', async (req, res) => {
    try {
      const boardIds = await monitor.registerDiscovered();
      res.json({ code: 0, msg: 'success', data: { boardIds } });
    } catch (error) {
      res.status(500).json({ code: 500, msg: errorMessage(error) });
    }
  });

  // 5. StopAll
  app.post('/boards/stop-all', async (req, res) => {
    try {
      await monitor.stopAll();
      res.json({ code: 0, msg: 'success' });
    } catch (error) {
      res.status(500).json({ code: 500, msg: errorMessage(error) });
    }
  });

  // 6. StopBoard
  app.post('/boards/:id/stop', async (req, res) => {
    const id = parseBoardId(req.params.id);
    if (id === null) return res.status(400).json({ code: 400, msg: 'Invalid board id' });
    try {
      const stopped = await monitor.stopBoard(id);
      if (!stopped) return res.status(404).json({ code: 404, msg: `Board ${id} not found` });
      res.json({ code: 0, msg: 'success' });
    } catch (error) {
      res.status(500).json({ code: 500, msg: errorMessage(error) });
    }
  });

  app.get('/settings', (req, res) => {
    res.json({ code: 0, msg: 'success', data: monitor.getSettings() });
  });

  app.put('/settings', async (req, res) => {
    const next: unknown = req.body;
    if (!next || typeof next !== 'object') return res.status(400).json({ code: 400, msg: 'Invalid settings' });
    try {
      // 未提供的字段沿用当前值
      const merged = { ...monitor.getSettings(), ...next };
      const saved = settingsStore ? await settingsStore.write(merged) : normalizeSettings(merged);
      monitor.applySettings(saved);
      res.json({ code: 0, msg: 'success', data: monitor.getSettings() });
    } catch (error) {
      res.status(500).json({ code: 500, msg: errorMessage(error) });
    }
  });

  return app;
}
