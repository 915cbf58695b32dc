/**
 * Local-time date stamps used in storage keys
 */

/**
 * Make local time follow the configured zone. Node applies a TZ assignment
 * to later Date calls.
 */
export function applyTimezone(timezone: string): void {
  process.env.TZ = timezone;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** YYYYMMDD */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** YYYYMMDD_HHMMSS */
export function formatTimestamp(date: Date): string {
  return `${formatDateStamp(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
