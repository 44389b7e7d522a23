import test from 'node:test';
import assert from 'node:assert/strict';
import { SerialPortMock } from 'serialport';
import { PortIOError, PortOpenError } from '../../core/errors';
import { SerialPortChannel, SerialPortFactory } from '../../core/SerialPortChannel';

function mockFactory() {
  const created: SerialPortMock[] = [];
  const factory: SerialPortFactory = (config) => {
    const port = new SerialPortMock({ path: config.path, baudRate: config.baudRate, autoOpen: false });
    created.push(port);
    return port;
  };
  return { factory, created };
}

async function pollUntilData(channel: SerialPortChannel, timeoutMs = 2000): Promise<Buffer> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const chunk = channel.pollAvailable();
    if (chunk.length > 0) return chunk;
    await new Promise((r) => setTimeout(r, 10));
  }
  return Buffer.alloc(0);
}

test('SerialPortChannel: missing port rejects with PortOpenError', async () => {
  SerialPortMock.binding.reset();
  const { factory } = mockFactory();
  const channel = new SerialPortChannel({ path: '/dev/missing', baudRate: 115200 }, factory);
  await assert.rejects(channel.open(), (e: unknown) => e instanceof PortOpenError && e.path === '/dev/missing');
  assert.equal(channel.isOpen, false);
  await channel.close();
});

test('SerialPortChannel: polls buffered bytes without blocking', async () => {
  SerialPortMock.binding.reset();
  SerialPortMock.binding.createPort('/dev/ttyMOCK0', { echo: false, record: false });
  const { factory, created } = mockFactory();
  const channel = new SerialPortChannel({ path: '/dev/ttyMOCK0', baudRate: 115200 }, factory);
  await channel.open();
  assert.equal(channel.isOpen, true);
  assert.equal(channel.pollAvailable().length, 0);

  created[0].port?.emitData(Buffer.from('hello board\n', 'utf8'));
  const chunk = await pollUntilData(channel);
  assert.equal(chunk.toString('utf8'), 'hello board\n');

  await channel.close();
});

test('SerialPortChannel: close is idempotent', async () => {
  SerialPortMock.binding.reset();
  SerialPortMock.binding.createPort('/dev/ttyMOCK1', { echo: false, record: false });
  const { factory, created } = mockFactory();
  const channel = new SerialPortChannel({ path: '/dev/ttyMOCK1', baudRate: 9600 }, factory);
  await channel.open();

  await Promise.all([channel.close(), channel.close()]);
  await channel.close();
  assert.equal(channel.isOpen, false);
  assert.equal(created[0].isOpen, false);
  assert.equal(channel.pollAvailable().length, 0);
});

test('SerialPortChannel: a close it did not ask for turns the next poll into PortIOError', async () => {
  SerialPortMock.binding.reset();
  SerialPortMock.binding.createPort('/dev/ttyMOCK2', { echo: false, record: false });
  const { factory, created } = mockFactory();
  const channel = new SerialPortChannel({ path: '/dev/ttyMOCK2', baudRate: 115200 }, factory);
  await channel.open();

  // 绕过 channel 直接关底层端口，相当于拔线
  await new Promise<void>((resolve, reject) => created[0].close((err) => (err ? reject(err) : resolve())));
  await new Promise((r) => setImmediate(r));

  assert.throws(
    () => channel.pollAvailable(),
    (e: unknown) => e instanceof PortIOError && e.code === 'EPortIO' && e.path === '/dev/ttyMOCK2' && e.message === 'port closed unexpectedly'
  );
  await channel.close();
  assert.equal(channel.isOpen, false);
});

test('SerialPortChannel: a port error surfaces once as PortIOError', async () => {
  SerialPortMock.binding.reset();
  SerialPortMock.binding.createPort('/dev/ttyMOCK3', { echo: false, record: false });
  const { factory, created } = mockFactory();
  const channel = new SerialPortChannel({ path: '/dev/ttyMOCK3', baudRate: 115200 }, factory);
  await channel.open();

  created[0].emit('error', new Error('framing error'));
  created[0].emit('error', new Error('overrun'));

  assert.throws(
    () => channel.pollAvailable(),
    (e: unknown) => e instanceof PortIOError && e.code === 'EPortIO' && e.message === 'framing error'
  );
  await channel.close();
  assert.equal(created[0].isOpen, false);
});
