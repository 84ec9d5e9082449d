import { format } from 'date-fns';

/**
 * Formats a Date (local time) as `YYYYMMDD_HHMMSS`, the timestamp embedded in archive names.
 */
export function formattedTimestamp(date: Date): string {
  return format(date, 'yyyyMMdd_HHmmss');
}
