const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * YYYY-MM-DD in UTC
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * YYYYMMDD in UTC, as expected by the NASA POWER API
 */
export function toCompactDate(date: Date): string {
  return toIsoDate(date).replace(/-/g, '');
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}
