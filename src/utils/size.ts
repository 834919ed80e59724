const UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB'];

// Decimal units, matching what Finder and `df -H` report
export function formatSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return '0 B';
  }
  if (bytes < 1000) {
    return `${Math.round(bytes)} B`;
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1000 && unit < UNITS.length - 1) {
    value /= 1000;
    unit++;
  }

  const digits = value < 10 ? 1 : 0;
  return `${value.toFixed(digits)} ${UNITS[unit]}`;
}

export const SIZE_THRESHOLDS = {
  DOCKER_MIN: 100 * 1024 * 1024,
} as const;
