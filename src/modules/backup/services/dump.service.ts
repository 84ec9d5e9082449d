import type { BackupConfig } from '../../../types/mixed';
import type { CommandRunner } from '../../../infrastructure/command-runner';
import { Logger } from '../../../infrastructure/logger';
import { formatCommand, redactArgs } from '../../../utils/redact';
import { Dump } from '../domain/dump';

/**
 * Runs mongodump to produce one gzip archive per invocation.
 */
export class DumpService {
  private readonly dump: Dump;

  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {
    this.dump = new Dump(logger);
  }

  /**
   * Dumps the configured scope to `{backupPath}/{prefix}-{timestamp}.gz`.
   *
   * @param now - Timestamp embedded in the archive name.
   * @returns The absolute path of the archive.
   * @throws CommandFailedError when mongodump fails; any partial archive is removed first.
   */
  async createArchive(config: BackupConfig, now: Date): Promise<string> {
    const archivePath = this.dump.buildArchivePath(config, now);
    const args = this.dump.buildArgs(config.mongo, archivePath);
    const command = config.tools.mongodump;

    this.logger.debug(`Running: ${formatCommand(command, redactArgs(args))}`);
    this.logger.startSpinner('Dumping to a compressed archive');

    try {
      await this.runner.run(command, args);
    } catch (error: unknown) {
      this.logger.failSpinner('mongodump failed');
      this.dump.cleanupFile(archivePath);
      throw error;
    }

    this.logger.succeedSpinner(`Created archive ${archivePath}`);
    return archivePath;
  }
}
