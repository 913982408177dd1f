/** Date UTC au format YYYY-MM-DD. */
export function isoDate(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}
