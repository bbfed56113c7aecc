const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/** `YYYYMMDD` in local time. */
export function formatDay(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * `YYYYMMDD_HHMMSS` in local time, optionally followed by `_ffffff`.
 * JavaScript clocks stop at milliseconds, so the last three digits are always zero.
 */
export function formatTimestamp(date: Date, options: { micros?: boolean } = {}): string {
  const base = `${formatDay(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return options.micros ? `${base}_${pad(date.getMilliseconds() * 1000, 6)}` : base;
}
