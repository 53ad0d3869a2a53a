/**
 * Truncate text to fit within a maximum length
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Shorten text for a single log line
 */
export function preview(text: string, maxLength: number = 100): string {
  return truncateText(text.replace(/\s+/g, ' ').trim(), maxLength);
}
