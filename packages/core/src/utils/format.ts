const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

/**
 * Human readable byte count, 1024-based, one decimal above bytes
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[unit]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Whole percentage of `done` against `total`, or undefined when the total is unknown
 */
export function formatPercent(done: number, total: number): string | undefined {
  if (total <= 0) {
    return undefined;
  }
  return `${Math.min(100, Math.floor((done / total) * 100))}%`;
}
