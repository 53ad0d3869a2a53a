/**
 * Calendar day keys in the local timezone
 */

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Format a date as YYYY-MM-DD using local time
 */
export function toDateKey(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
