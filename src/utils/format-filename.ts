import { formattedTimestamp } from './formatted-timestamp';

const ARCHIVE_EXTENSION = '.gz';

/**
 * Builds the archive filename `{prefix}-{YYYYMMDD_HHMMSS}.gz`.
 *
 * @param prefix - The configured FILE_PREFIX.
 * @param date - Moment the backup started.
 */
export function formatFilename(prefix: string, date: Date): string {
  return `${prefix}-${formattedTimestamp(date)}${ARCHIVE_EXTENSION}`;
}
