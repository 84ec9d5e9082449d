import type { AzureTargetConfig, BackupConfig } from '../../../types/mixed';
import type { CommandRunner } from '../../../infrastructure/command-runner';
import type { UploadStrategy } from '../interfaces/upload-strategy.interface';
import { Logger } from '../../../infrastructure/logger';
import { formatCommand, redactSasUri } from '../../../utils/redact';

export class AzureBlobUploadStrategy implements UploadStrategy {
  constructor(
    private readonly target: AzureTargetConfig,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  async upload(archivePath: string, config: BackupConfig): Promise<string> {
    const destination = redactSasUri(this.target.sasUri);

    this.logger.info('Using Azure Blob as the backup target');
    this.logger.debug(`Running: ${formatCommand(config.tools.azcopy, ['cp', archivePath, destination])}`);
    this.logger.startSpinner(`Uploading to ${destination}`);

    try {
      await this.runner.run(config.tools.azcopy, ['cp', archivePath, this.target.sasUri], {
        env: config.subprocessEnv,
      });
    } catch (error: unknown) {
      this.logger.failSpinner('Azure Blob upload failed');
      throw error;
    }

    this.logger.succeedSpinner(`Uploaded to ${destination}`);
    return destination;
  }
}
