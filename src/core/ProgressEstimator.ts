import { Cancel, Scheduler } from './scheduler';

export const DEFAULT_TOTAL_DURATION_MS = 770_000; // 12 分 50 秒
export const DEFAULT_TICK_INTERVAL_MS = 10_000;

export interface ProgressEstimatorOptions {
  scheduler: Scheduler;
  totalDurationMs?: number;
  tickIntervalMs?: number;
  onProgress?: (percent: number) => void;
  // 计时达到 100% 时调用一次
  onComplete?: () => void;
}

/**
 * 按固定时长估算的进度条。
 *
 * 这是一个启发式时钟：进度只随时间增长，与串口实际传输的数据无关，
 * 到达 100% 也不代表固件真的写入成功。默认参数对应当前固件镜像的
 * 典型烧录时长 (770 s / 10 s = 77 步，每步 100/77 %)。
 */
export class ProgressEstimator {
  private readonly scheduler: Scheduler;
  private readonly tickIntervalMs: number;
  private readonly totalTicks: number;
  private readonly onProgress?: (percent: number) => void;
  private readonly onComplete?: () => void;
  private ticks = 0;
  private value = 0;
  private cancelTimer: Cancel | null = null;
  private started = false;
  private finished = false;

  constructor(opts: ProgressEstimatorOptions) {
    this.scheduler = opts.scheduler;
    this.tickIntervalMs = Math.max(1, opts.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS);
    const total = Math.max(this.tickIntervalMs, opts.totalDurationMs ?? DEFAULT_TOTAL_DURATION_MS);
    this.totalTicks = Math.max(1, Math.round(total / this.tickIntervalMs));
    this.onProgress = opts.onProgress;
    this.onComplete = opts.onComplete;
  }

  public get percent(): number {
    return this.value;
  }

  public get stepPercent(): number {
    return 100 / this.totalTicks;
  }

  public get isRunning(): boolean {
    return this.cancelTimer !== null;
  }

  public get isFinished(): boolean {
    return this.finished;
  }

  public start(): void {
    if (this.started || this.finished) return;
    this.started = true;
    this.cancelTimer = this.scheduler.every(this.tickIntervalMs, () => this.tick());
  }

  public tick(): void {
    if (this.finished) return;
    this.ticks += 1;
    // 用步数计算而非累加，第 totalTicks 步恰好为 100
    this.value = Math.min(100, (this.ticks * 100) / this.totalTicks);
    if (this.ticks >= this.totalTicks) {
      this.value = 100;
      this.finish();
      this.onProgress?.(this.value);
      this.onComplete?.();
      return;
    }
    this.onProgress?.(this.value);
  }

  /**
   * 检测到完成标志时直接置满，不触发 onComplete。
   */
  public complete(): void {
    if (this.finished) return;
    this.value = 100;
    this.finish();
    this.onProgress?.(this.value);
  }

  public stop(): void {
    if (this.cancelTimer) {
      this.cancelTimer();
      this.cancelTimer = null;
    }
  }

  private finish(): void {
    this.finished = true;
    this.stop();
  }
}
