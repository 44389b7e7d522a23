import { JsonFileStore } from './JsonFileStore';
import type { MonitorSettingsV1 } from '../types/settings';
import { COMPLETION_MARKER } from '../core/completion';
import { DEFAULT_TICK_INTERVAL_MS, DEFAULT_TOTAL_DURATION_MS } from '../core/ProgressEstimator';

export function getDefaultSettings(): MonitorSettingsV1 {
  return {
    schemaVersion: 1,
    updatedAt: Date.now(),
    defaultBaudRate: 115200,
    completionMarker: COMPLETION_MARKER,
    totalDurationMs: DEFAULT_TOTAL_DURATION_MS,
    tickIntervalMs: DEFAULT_TICK_INTERVAL_MS,
    pollIntervalMs: 100,
    displayIntervalMs: 33,
    maxLineBytes: 4096,
    includeNativePorts: false,
  };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function intInRange(v: unknown, fallback: number, min: number, max: number): number {
  const n = Number(v);
  if (!Number.isFinite(n)) return fallback;
  return Math.min(max, Math.max(min, Math.round(n)));
}

export function normalizeBaudRate(v: unknown, fallback: number): number {
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0 || n > 4_000_000) return fallback;
  return n;
}

export function normalizeSettings(input: unknown): MonitorSettingsV1 {
  const d = getDefaultSettings();
  if (!isRecord(input)) return d;
  const marker = typeof input.completionMarker === 'string' ? input.completionMarker.trim() : '';
  const tickIntervalMs = intInRange(input.tickIntervalMs, d.tickIntervalMs, 10, 3_600_000);
  return {
    schemaVersion: 1,
    updatedAt: Number.isFinite(Number(input.updatedAt)) ? Number(input.updatedAt) : d.updatedAt,
    defaultBaudRate: normalizeBaudRate(input.defaultBaudRate, d.defaultBaudRate),
    completionMarker: marker || d.completionMarker,
    // 总时长至少一个 tick
    totalDurationMs: intInRange(input.totalDurationMs, d.totalDurationMs, tickIntervalMs, 24 * 3_600_000),
    tickIntervalMs,
    pollIntervalMs: intInRange(input.pollIntervalMs, d.pollIntervalMs, 10, 1000),
    displayIntervalMs: intInRange(input.displayIntervalMs, d.displayIntervalMs, 16, 1000),
    maxLineBytes: intInRange(input.maxLineBytes, d.maxLineBytes, 64, 1024 * 1024),
    includeNativePorts: input.includeNativePorts === true,
  };
}

export class MonitorSettingsStore {
  private store: JsonFileStore<unknown>;

  constructor(filePath: string) {
    this.store = new JsonFileStore<unknown>(filePath);
  }

  async read(): Promise<MonitorSettingsV1> {
    const raw = await this.store.read(getDefaultSettings());
    return normalizeSettings(raw);
  }

  async write(next: unknown): Promise<MonitorSettingsV1> {
    const normalized = { ...normalizeSettings(next), updatedAt: Date.now() };
    await this.store.write(normalized);
    return normalized;
  }
}
