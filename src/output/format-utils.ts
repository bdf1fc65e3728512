/**
 * Shared formatting utilities for terminal and CSV output.
 */

/** Pad a string to a minimum length, accounting for ANSI escape sequences */
export function padRight(str: string, len: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const padding = Math.max(0, len - stripped.length);
  return str + ' '.repeat(padding);
}

/** Escape a value for CSV output (quote if it contains commas, quotes or newlines) */
export function csvEscape(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** YYYY-MM-DD of a UTC date */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** "12 months", or "snapshot" for a point-in-time statement */
export function formatPeriod(months: number | null): string {
  return months === null ? 'snapshot' : `${months} months`;
}
