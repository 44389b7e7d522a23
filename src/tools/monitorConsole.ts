import { FlashMonitor } from '../core/FlashMonitor';
import { getDefaultSettings, normalizeSettings } from '../storage/MonitorSettingsStore';
import { BoardEvent } from '../types/board';

// 无界面的监控：扫描（或指定）串口，把各板事件打印到终端，Ctrl+C 退出

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith('--')) continue;
    const key = a.slice(2);
    const next = argv[i + 1];
    if (!next || next.startsWith('--')) {
      out[key] = true;
    } else {
      out[key] = next;
      i += 1;
    }
  }
  return out;
}

function describe(event: BoardEvent): string | null {
  const tag = `[Board ${event.boardId}]`;
  switch (event.type) {
    case 'line':
      return `${tag} ${event.text}`;
    case 'decodeError':
      return `${tag} WARN ${event.message}`;
    case 'portError':
      return `${tag} ERROR Serial port error: ${event.message}`;
    case 'firstTransmission':
      return `${tag} first transmission received, timer started`;
    case 'flashed':
      return event.source === 'marker'
        ? `${tag} PASSED: firmware flashing completed`
        : `${tag} PASSED: estimated flash time elapsed`;
    case 'progress':
      return `${tag} progress ${Math.floor(event.percent)}%`;
    case 'state':
      return `${tag} state -> ${event.state}`;
    case 'elapsed':
      return null;
  }
}

async function main() {
  const args = parseArgs(process.argv);
  const settings = normalizeSettings({
    ...getDefaultSettings(),
    defaultBaudRate: typeof args.baud === 'string' ? Number(args.baud) : undefined,
    includeNativePorts: args.native === true
  });
  const monitor = new FlashMonitor({ settings });

  monitor.subscribe((event) => {
    const line = describe(event);
    if (line === null) return;
    if (event.type === 'portError') console.error(line);
    else console.log(line);
  });

  if (typeof args.port === 'string') {
    for (const p of args.port.split(',').map(s => s.trim()).filter(Boolean)) {
      monitor.register(p);
    }
  } else {
    const ids = await monitor.registerDiscovered();
    if (ids.length === 0) {
      console.log('No serial ports found. Plug in a board or pass --port <path>.');
      return;
    }
  }

  for (const snap of monitor.list()) {
    console.log(`[Board ${snap.id}] monitoring ${snap.path} @ ${snap.baudRate}`);
  }

  let stopping = false;
  process.on('SIGINT', () => {
    if (stopping) return;
    stopping = true;
    console.log('Stopping all boards...');
    monitor.stopAll().then(
      () => process.exit(0),
      (e) => {
        console.error('Stop failed:', e);
        process.exit(1);
      }
    );
  });
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
