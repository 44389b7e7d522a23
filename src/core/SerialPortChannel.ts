import { SerialPort } from 'serialport';
import { SerialConfig } from '../types/serial';
import { PortIOError, PortOpenError } from './errors';

/**
 * 会话所需的最小串口能力。
 */
export interface SerialChannel {
  readonly path: string;
  readonly isOpen: boolean;
  open(): Promise<void>;
  // 非阻塞：返回当前已缓冲的数据，没有则返回空 Buffer
  pollAvailable(): Buffer;
  // 幂等，永不 reject
  close(): Promise<void>;
}

// serialport 流对象中被用到的部分，便于测试注入 SerialPortMock
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  read(): unknown;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: (err?: Error | null) => void): this;
}

export type SerialPortFactory = (config: SerialConfig) => SerialPortLike;

export const createSystemPort: SerialPortFactory = (config) => {
  const { path, baudRate, dataBits = 8, stopBits = 1, parity = 'none' } = config;
  return new SerialPort({ path, baudRate, dataBits, stopBits, parity, autoOpen: false });
};

const EMPTY = Buffer.alloc(0);

export class SerialPortChannel implements SerialChannel {
  public readonly path: string;
  private readonly config: SerialConfig;
  private readonly port: SerialPortLike;
  private ioError: PortIOError | null = null;
  private closing: Promise<void> | null = null;

  constructor(config: SerialConfig, createPort: SerialPortFactory = createSystemPort) {
    this.config = config;
    this.path = config.path;
    this.port = createPort(config);

    this.port.on('error', (err) => {
      if (this.closing) return;
      console.error(`[SerialPortChannel] Port ${this.path} error:`, err.message);
      this.ioError = this.ioError ?? new PortIOError(this.path, err.message);
    });

    this.port.on('close', (err) => {
      if (this.closing) return;
      // 非本端发起的关闭，多为拔线
      const reason = err?.message || 'port closed unexpectedly';
      console.warn(`[SerialPortChannel] Port ${this.path} closed: ${reason}`);
      this.ioError = this.ioError ?? new PortIOError(this.path, reason);
    });
  }

  public get isOpen(): boolean {
    return this.port.isOpen && !this.closing;
  }

  public open(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.port.open((err) => {
        if (err) {
          reject(new PortOpenError(this.path, err.message));
          return;
        }
        console.log(`[SerialPortChannel] Port ${this.path} opened (BaudRate=${this.config.baudRate})`);
        resolve();
      });
    });
  }

  public pollAvailable(): Buffer {
    if (this.ioError) throw this.ioError;
    if (!this.isOpen) return EMPTY;

    const parts: Buffer[] = [];
    let chunk = this.port.read();
    while (chunk !== null && chunk !== undefined) {
      if (Buffer.isBuffer(chunk)) parts.push(chunk);
      else if (typeof chunk === 'string') parts.push(Buffer.from(chunk, 'latin1'));
      chunk = this.port.read();
    }
    if (parts.length === 0) return EMPTY;
    return parts.length === 1 ? parts[0] : Buffer.concat(parts);
  }

  public close(): Promise<void> {
    if (this.closing) return this.closing;
    this.closing = new Promise<void>((resolve) => {
      if (!this.port.isOpen) {
        resolve();
        return;
      }
      this.port.close((err) => {
        // 逻辑上已经关闭，底层报错只记录
        if (err) console.error(`[SerialPortChannel] Error closing port ${this.path}:`, err.message);
        else console.log(`[SerialPortChannel] Port ${this.path} closed.`);
        resolve();
      });
    });
    return this.closing;
  }
}
