/**
 * Date helpers shared by the saga engine and services
 */

/**
 * Format a date as an ISO-8601 string
 */
export function formatDateToISO(date: Date): string {
  return date.toISOString();
}

/**
 * Parse an ISO-8601 string, rejecting values that do not form a valid date
 */
export function parseISOString(isoString: string): Date {
  const date = new Date(isoString);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid ISO date: ${isoString}`);
  }
  return date;
}

export function addMilliseconds(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}

/**
 * Milliseconds elapsed between two dates, never negative
 */
export function elapsedMs(from: Date, to: Date = new Date()): number {
  return Math.max(0, to.getTime() - from.getTime());
}

/**
 * Human readable duration, e.g. "1h 02m 03s" or "850ms"
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (value: number) => value.toString().padStart(2, '0');

  if (hours > 0) {
    return `${hours}h ${pad(minutes)}m ${pad(seconds)}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${pad(seconds)}s`;
  }
  return `${seconds}s`;
}
