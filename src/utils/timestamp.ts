function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * YYYYMMDD_HHmmss_SSS in local time, sortable by name
 */
export function fileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    `_${pad(date.getMilliseconds(), 3)}`
  );
}

/**
 * HH:MM:SS for job log lines
 */
export function logTime(date: Date = new Date()): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * YYYY-MM-DD prefix of an ISO-like date, or null
 */
export function isoDay(value: string | undefined): string | null {
  if (!value) return null;
  const match = value.match(/^(\d{4}-\d{2}-\d{2})/);
  return match ? match[1] : null;
}
