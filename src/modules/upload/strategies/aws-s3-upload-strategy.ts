import * as path from 'path';
import type { AwsTargetConfig, BackupConfig } from '../../../types/mixed';
import type { CommandRunner } from '../../../infrastructure/command-runner';
import type { UploadStrategy } from '../interfaces/upload-strategy.interface';
import { Logger } from '../../../infrastructure/logger';
import { formatCommand } from '../../../utils/redact';

export class AwsS3UploadStrategy implements UploadStrategy {
  constructor(
    private readonly target: AwsTargetConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  /** `s3Uri` is treated as a prefix; the object keeps the archive's filename. */
  static destinationFor(s3Uri: string, archivePath: string): string {
    const base = s3Uri.endsWith('/') ? s3Uri : `${s3Uri}/`;
    return `${base}${path.basename(archivePath)}`;
  }

  async upload(archivePath: string, config: BackupConfig): Promise<string> {
    const destination = AwsS3UploadStrategy.destinationFor(this.target.s3Uri, archivePath);
    const args = ['s3', 'cp', archivePath, destination];

    this.logger.info(`Using AWS S3 as the backup target (${this.target.auth} credentials, ${this.target.region})`);
    this.logger.debug(`Running: ${formatCommand(config.tools.aws, args)}`);
    this.logger.startSpinner(`Uploading to ${destination}`);

    try {
      await this.runner.run(config.tools.aws, args, { env: config.subprocessEnv });
    } catch (error: unknown) {
      this.logger.failSpinner('S3 upload failed');
      throw error;
    }

    this.logger.succeedSpinner(`Uploaded to ${destination}`);
    return destination;
  }
}
