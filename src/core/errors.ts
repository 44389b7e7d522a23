export class PortOpenError extends Error {
  code = 'EPortOpen' as const;
  path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'PortOpenError';
    this.path = path;
  }
}

export class PortIOError extends Error {
  code = 'EPortIO' as const;
  path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = 'PortIOError';
    this.path = path;
  }
}

export class DecodeError extends Error {
  code = 'EDecode' as const;
  invalidBytes: number;

  constructor(message: string, invalidBytes: number) {
    super(message);
    this.name = 'DecodeError';
    this.invalidBytes = invalidBytes;
  }
}

export class EServerBusy extends Error {
  code = 'EServerBusy' as const;
  lockedPid?: number;
  lockFilePath?: string;

  constructor(message: string, options?: { lockedPid?: number; lockFilePath?: string }) {
    super(message);
    this.name = 'EServerBusy';
    this.lockedPid = options?.lockedPid;
    this.lockFilePath = options?.lockFilePath;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
