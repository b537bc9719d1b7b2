/**
 * Format bytes to human readable string.
 *
 * @example formatBytes(500) → "500 B"
 * @example formatBytes(1536) → "1.5 KB"
 * @example formatBytes(1572864) → "1.5 MB"
 * @example formatBytes(2147483648) → "2.00 GB"
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

/**
 * Format milliseconds as a short duration.
 *
 * @example formatDuration(850) → "850ms"
 * @example formatDuration(42000) → "42s"
 * @example formatDuration(125000) → "2m 5s"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

/**
 * @example formatPercent(33.3333) → "33.33%"
 */
export function formatPercent(percent: number): string {
  return `${percent.toFixed(2)}%`;
}

/**
 * Single progress line: "model.safetensors: 42.00% (420.0 KB / 1000.0 KB)".
 * Without a declared total only the byte count is shown.
 */
export function formatProgress(fileName: string, bytesWritten: number, totalBytes?: number): string {
  if (!totalBytes) {
    return `${fileName}: ${formatBytes(bytesWritten)}`;
  }
  const percent = Math.min(100, (bytesWritten / totalBytes) * 100);
  return `${fileName}: ${formatPercent(percent)} (${formatBytes(bytesWritten)} / ${formatBytes(totalBytes)})`;
}
