/** Format a date as YYYY-MM-DD (UTC) */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Default reporting window: the last 7 days up to today */
export function defaultPeriod(now: Date = new Date()): { date1: string; date2: string } {
  const start = new Date(now.getTime() - 7 * 24 * 60 * 60 * 1000);
  return { date1: isoDate(start), date2: isoDate(now) };
}
