import fs from 'fs/promises';
import path from 'path';

function errorCode(e: unknown): string | undefined {
  if (e && typeof e === 'object' && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

/**
 * 原子写入的 JSON 文件：先写临时文件再 rename，写前保留一份 .bak。
 */
export class JsonFileStore<T> {
  private filePath: string;
  private lastSerialized: string | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  public get path(): string {
    return this.filePath;
  }

  public async read(defaultValue: T): Promise<T> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return defaultValue;
      throw e;
    }
    try {
      const parsed: T | null = JSON.parse(raw);
      return parsed ?? defaultValue;
    } catch (e) {
      console.warn(`[JsonFileStore] ${this.filePath} is not valid JSON, using defaults`);
      return defaultValue;
    }
  }

  public async write(value: T): Promise<void> {
    const serialized = JSON.stringify(value, null, 2);
    if (serialized === this.lastSerialized) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (e) {
      if (errorCode(e) !== 'ENOENT') {
        throw e;
      }
    }
    const tmpPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tmpPath, serialized, 'utf8');
    await fs.rename(tmpPath, this.filePath);
    this.lastSerialized = serialized;
  }
}
