// 固件启动完成后设备打印的标志行
export const COMPLETION_MARKER = 'Span Gateway 2.0.0 span-gateway';

export function isCompletionLine(text: string, marker: string = COMPLETION_MARKER): boolean {
  if (!marker) return false;
  return text.includes(marker);
}
