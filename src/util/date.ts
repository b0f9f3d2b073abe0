/**
 * Date Helpers
 */

/**
 * Gets a date in YYYY-MM-DD format as seen in the given IANA timezone
 *
 * Draws are scheduled in local time, so "today" for a prediction target is
 * the draw operator's calendar day, not the server's.
 *
 * @param timeZone - IANA zone name, e.g. 'Asia/Manila'
 * @param now - Instant to convert (defaults to the current time)
 */
export function calendarDateIn(timeZone: string, now: Date = new Date()): string {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });

  const parts = formatter.formatToParts(now);
  const year = parts.find(p => p.type === 'year')?.value;
  const month = parts.find(p => p.type === 'month')?.value;
  const day = parts.find(p => p.type === 'day')?.value;

  return `${year}-${month}-${day}`;
}
