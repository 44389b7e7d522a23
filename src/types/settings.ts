export interface MonitorSettingsV1 {
  schemaVersion: 1;
  updatedAt: number;
  defaultBaudRate: number;
  completionMarker: string;
  // 进度为固定时长估算，不代表真实烧录进度
  totalDurationMs: number;
  tickIntervalMs: number;
  pollIntervalMs: number;
  displayIntervalMs: number;
  maxLineBytes: number;
  includeNativePorts: boolean;
}
