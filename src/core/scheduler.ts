import { setTimeout as sleepTimer } from 'timers/promises';

export type Cancel = () => void;

/**
 * 会话使用的时钟与定时器抽象，测试中可替换为手动推进的实现。
 */
export interface Scheduler {
  // 单调时钟，毫秒
  now(): number;
  // 被 signal 中止时提前 resolve，不会 reject
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  every(ms: number, fn: () => void): Cancel;
}

export const systemScheduler: Scheduler = {
  now: () => performance.now(),

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return;
    try {
      await sleepTimer(ms, undefined, { signal });
    } catch (e) {
      if (e instanceof Error && e.name === 'AbortError') return;
      throw e;
    }
  },

  every(ms: number, fn: () => void): Cancel {
    const timer = setInterval(fn, ms);
    return () => clearInterval(timer);
  }
};
