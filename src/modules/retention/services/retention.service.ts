import { promises as fs } from 'fs';
import * as path from 'path';
import { isBefore, subDays } from 'date-fns';
import { Logger } from '../../../infrastructure/logger';

export class RetentionService {
  constructor(private readonly logger: Logger) {}

  /**
   * Deletes every regular file directly under `directory` last modified before `now - retentionDays`.
   * Matches on age only, so files this tool did not create are removed too.
   * The first filesystem error aborts the sweep.
   *
   * @returns Absolute paths of the deleted files.
   */
  async sweep(directory: string, retentionDays: number, now: Date): Promise<string[]> {
    const backupDir = path.resolve(directory);
    const cutoff = subDays(now, retentionDays);
    this.logger.info(`Cleaning up local backups older than ${retentionDays} days`);
    this.logger.debug(`Retention cutoff: ${cutoff.toISOString()}`);

    const entries = await fs.readdir(backupDir, { withFileTypes: true });
    const removed: string[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const filePath = path.join(backupDir, entry.name);
      const { mtime } = await fs.stat(filePath);
      if (isBefore(mtime, cutoff)) {
        await fs.unlink(filePath);
        this.logger.debug(`Deleted ${filePath}`);
        removed.push(filePath);
      }
    }

    this.logger.info(`Removed ${removed.length} expired file(s) from ${backupDir}`);
    return removed;
  }
}
