import type { BackupConfig } from '../../../types/mixed';

export interface UploadStrategy {
  /**
   * Copies a local archive to the configured cloud target.
   * @param archivePath - Absolute path of the archive produced by the dump.
   * @returns The destination, with credentials masked, for logging.
   * @throws CommandFailedError if the copy tool exits with a non-zero status.
   */
  upload(archivePath: string, config: BackupConfig): Promise<string>;
}
