/**
 * Formatting helpers for report output.
 */

/**
 * Pluralize a noun phrase by count: `1 error`, `2 errors`.
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Format a duration in milliseconds as `H:MM:SS.mmm`.
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;
  return `${hours}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
}

/**
 * Collapse whitespace runs and truncate to `max` characters.
 */
export function condense(text: string, max = 80): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.length > max ? `${collapsed.slice(0, max - 3)}...` : collapsed;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
