import fs from 'fs';
import path from 'path';
import { EServerBusy } from './errors';

export interface InstanceLock {
  release: () => void;
}

export function isPidAlive(pid: unknown): boolean {
  const n = Number(pid);
  if (!Number.isFinite(n) || n <= 0) return false;
  try {
    process.kill(n, 0);
    return true;
  } catch (e) {
    return false;
  }
}

function readLockedPid(lockFilePath: string): number | undefined {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockFilePath, 'utf8'));
    if (parsed && typeof parsed === 'object' && 'pid' in parsed) return Number(parsed.pid);
  } catch (e) {
    // 锁文件损坏按过期处理
    console.warn(`[instanceLock] Unreadable lock file ${lockFilePath}:`, e);
  }
  return undefined;
}

function isAlreadyExists(e: unknown): boolean {
  return !!e && typeof e === 'object' && 'code' in e && e.code === 'EEXIST';
}

/**
 * 同一台机器上只允许一个监控服务占用串口；锁文件记录持有者 pid，
 * 持有者已退出时视为过期锁并接管。
 */
export function acquireInstanceLock(lockFilePath: string): InstanceLock {
  fs.mkdirSync(path.dirname(lockFilePath), { recursive: true });

  let fd: number;
  try {
    fd = fs.openSync(lockFilePath, 'wx');
  } catch (e) {
    if (!isAlreadyExists(e)) throw e;
    const lockedPid = readLockedPid(lockFilePath);
    if (isPidAlive(lockedPid)) {
      throw new EServerBusy(`Another monitor instance is already running (pid ${lockedPid})`, {
        lockedPid,
        lockFilePath
      });
    }
    console.warn(`[instanceLock] Removing stale lock ${lockFilePath}`);
    fs.rmSync(lockFilePath, { force: true });
    return acquireInstanceLock(lockFilePath);
  }

  try {
    fs.writeFileSync(fd, JSON.stringify({ pid: process.pid, createdAt: new Date().toISOString() }, null, 2), 'utf8');
  } finally {
    fs.closeSync(fd);
  }

  let released = false;
  const release = () => {
    if (released) return;
    released = true;
    process.removeListener('exit', release);
    fs.rmSync(lockFilePath, { force: true });
  };

  process.once('exit', release);

  return { release };
}
