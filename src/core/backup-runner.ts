import type { BackupConfig, BackupPhase, BackupResult, EnvSource } from '../types/mixed';
import type { CommandRunner } from '../infrastructure/command-runner';
import { Logger } from '../infrastructure/logger';
import { parseBackupConfig } from '../config/backup-config';
import { DumpService } from '../modules/backup/services/dump.service';
import { UploadStrategySelector } from '../modules/upload/strategies/upload-strategy-selector';
import { RetentionService } from '../modules/retention/services/retention.service';

export interface BackupRunnerDeps {
  env: EnvSource;
  runner: CommandRunner;
  logger: Logger;
  /** Clock used for the archive name and the retention cutoff. */
  now?: () => Date;
}

/**
 * One backup run: validate → dump → upload → clean.
 * Any failure moves the run to `failed` and is rethrown; nothing after the failing phase runs.
 */
export class BackupRunner {
  private currentPhase: BackupPhase = 'validating';
  private readonly dumpService: DumpService;
  private readonly uploadSelector: UploadStrategySelector;
  private readonly retentionService: RetentionService;
  private readonly now: () => Date;

  constructor(private readonly deps: BackupRunnerDeps) {
    const { runner, logger } = deps;
    this.dumpService = new DumpService(runner, logger.child(DumpService.name));
    this.uploadSelector = new UploadStrategySelector(runner, logger.child('Upload'));
    this.retentionService = new RetentionService(logger.child(RetentionService.name));
    this.now = deps.now ?? (() => new Date());
  }

  get phase(): BackupPhase {
    return this.currentPhase;
  }

  async run(): Promise<BackupResult> {
    const { logger } = this.deps;

    try {
      this.currentPhase = 'validating';
      const config: BackupConfig = parseBackupConfig(this.deps.env, logger.child('Config'));

      const startedAt = this.now();
      logger.info('*** Backup Started ***');
      logger.info(startedAt.toString());

      this.currentPhase = 'dumping';
      const archivePath = await this.dumpService.createArchive(config, startedAt);

      this.currentPhase = 'uploading';
      const destination = await this.uploadSelector.select(config.target).upload(archivePath, config);

      this.currentPhase = 'cleaning';
      const removedFiles = await this.retentionService.sweep(config.backupPath, config.retentionDays, this.now());

      this.currentPhase = 'done';
      logger.info('Backup Complete!');
      return { archivePath, destination, removedFiles };
    } catch (error: unknown) {
      const failedPhase = this.currentPhase;
      this.currentPhase = 'failed';
      logger.error(`Backup failed while ${failedPhase}`);
      throw error;
    }
  }
}
