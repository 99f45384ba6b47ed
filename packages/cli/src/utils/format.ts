const UNITS = ['B', 'kB', 'MB', 'GB', 'TB'];

/**
 * Format a signed byte delta with decimal units, e.g. `+77.8 kB`
 */
export function formatBytes(bytes: number): string {
  const sign = bytes > 0 ? '+' : bytes < 0 ? '-' : '';
  let value = Math.abs(bytes);
  let unit = 0;

  while (value >= 1000 && unit < UNITS.length - 1) {
    value /= 1000;
    unit++;
  }

  const text = unit === 0 ? String(value) : value.toFixed(1);
  return `${sign}${text} ${UNITS[unit]}`;
}
