import { DecodeError } from './errors';

export interface DecodedLine {
  text: string;
  // 该行含无法解码的字节时附带，已被丢弃
  error?: DecodeError;
}

export interface LossyDecodeResult {
  text: string;
  invalidBytes: number;
}

const NEWLINE = 0x0a;

function utf8SeqLen(lead: number): number {
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

function isCont(b: number): boolean {
  return b >= 0x80 && b <= 0xbf;
}

function isValidUtf8At(bytes: Buffer, i: number, len: number): boolean {
  if (i + len > bytes.length) return false;
  const b0 = bytes[i];
  const b1 = bytes[i + 1];
  if (!isCont(b1)) return false;
  if (len === 2) return true;
  if (!isCont(bytes[i + 2])) return false;
  if (len === 3) {
    if (b0 === 0xe0 && b1 < 0xa0) return false;
    if (b0 === 0xed && b1 >= 0xa0) return false;
    return true;
  }
  if (!isCont(bytes[i + 3])) return false;
  if (b0 === 0xf0 && b1 < 0x90) return false;
  if (b0 === 0xf4 && b1 >= 0x90) return false;
  return true;
}

/**
 * 宽松 UTF-8 解码：合法序列原样保留，非法字节直接丢弃并计数。
 */
export function decodeUtf8Lossy(input: Buffer): LossyDecodeResult {
  const kept: Buffer[] = [];
  let invalidBytes = 0;
  let runStart = 0;
  let i = 0;

  while (i < input.length) {
    const b = input[i];
    if (b < 0x80) {
      i += 1;
      continue;
    }
    const len = utf8SeqLen(b);
    if (len && isValidUtf8At(input, i, len)) {
      i += len;
      continue;
    }
    if (i > runStart) kept.push(input.subarray(runStart, i));
    invalidBytes += 1;
    i += 1;
    runStart = i;
  }
  if (runStart < input.length) kept.push(input.subarray(runStart));

  const text = invalidBytes === 0 ? input.toString('utf8') : Buffer.concat(kept).toString('utf8');
  return { text, invalidBytes };
}

export class LineDecoder {
  private pending: Buffer = Buffer.alloc(0);
  private readonly maxLineBytes: number;

  constructor(opts?: { maxLineBytes?: number }) {
    this.maxLineBytes = Math.max(1, opts?.maxLineBytes ?? 4096);
  }

  /**
   * 追加一段原始字节，返回其中已完整的行（已 trim）。
   */
  public push(chunk: Buffer): DecodedLine[] {
    const next = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;
    const lines: DecodedLine[] = [];

    let start = 0;
    let idx = next.indexOf(NEWLINE, start);
    while (idx !== -1) {
      lines.push(this.decodeSegment(next.subarray(start, idx)));
      start = idx + 1;
      idx = next.indexOf(NEWLINE, start);
    }

    let rest = next.subarray(start);
    // 设备长时间不发换行时按上限强制切行
    while (rest.length >= this.maxLineBytes) {
      lines.push(this.decodeSegment(rest.subarray(0, this.maxLineBytes)));
      rest = rest.subarray(this.maxLineBytes);
    }
    this.pending = Buffer.from(rest);
    return lines;
  }

  /**
   * 取出缓冲区中未以换行结尾的残余数据。
   */
  public flush(): DecodedLine | null {
    if (this.pending.length === 0) return null;
    const line = this.decodeSegment(this.pending);
    this.pending = Buffer.alloc(0);
    return line;
  }

  public get pendingBytes(): number {
    return this.pending.length;
  }

  private decodeSegment(segment: Buffer): DecodedLine {
    const { text, invalidBytes } = decodeUtf8Lossy(segment);
    const trimmed = text.trim();
    if (invalidBytes === 0) return { text: trimmed };
    return {
      text: trimmed,
      error: new DecodeError(`Decoding error: dropped ${invalidBytes} invalid byte(s)`, invalidBytes)
    };
  }
}
