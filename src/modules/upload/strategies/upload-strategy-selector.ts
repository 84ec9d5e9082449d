import type { UploadTargetConfig } from '../../../types/mixed';
import type { CommandRunner } from '../../../infrastructure/command-runner';
import type { UploadStrategy } from '../interfaces/upload-strategy.interface';
import { Logger } from '../../../infrastructure/logger';
import { AwsS3UploadStrategy } from './aws-s3-upload-strategy';
import { AzureBlobUploadStrategy } from './azure-blob-upload-strategy';

export class UploadStrategySelector {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  select(target: UploadTargetConfig): UploadStrategy {
    switch (target.type) {
      case 'aws':
        return new AwsS3UploadStrategy(target, this.runner, this.logger.child(AwsS3UploadStrategy.name));
      case 'azure':
        return new AzureBlobUploadStrategy(target, this.runner, this.logger.child(AzureBlobUploadStrategy.name));
    }
  }
}
