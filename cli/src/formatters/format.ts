/**
 * `0.4` → `0ms`, `12.6` → `13ms`, `1500` → `1.50s`
 */
export function formatMs(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(2)}s`;
}

export function formatSeconds(seconds: number): string {
  return formatMs(seconds * 1000);
}
