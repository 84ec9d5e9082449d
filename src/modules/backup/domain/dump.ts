import * as fs from 'fs';
import * as path from 'path';
import type { BackupConfig, MongoConnectionConfig } from '../../../types/mixed';
import { formatFilename } from '../../../utils/format-filename';
import { Logger } from '../../../infrastructure/logger';

export class Dump {
  constructor(private readonly logger: Logger) {}

  /**
   * mongodump arguments for a compressed archive of the configured scope.
   * Authentication is always username/password against the auth database.
   */
  buildArgs(mongo: MongoConnectionConfig, archivePath: string): string[] {
    const args = [
      `--uri=${mongo.uri}`,
      `--username=${mongo.username}`,
      `--password=${mongo.password}`,
      `--authenticationDatabase=${mongo.authenticationDatabase}`,
    ];

    if (mongo.scope === 'specific') {
      args.push(`--db=${mongo.database}`);
      this.logger.info(`Backing up the ${mongo.database} database`);
    } else {
      this.logger.info('Backing up ALL databases');
    }

    args.push(`--archive=${archivePath}`, '--gzip');
    return args;
  }

  buildArchivePath(config: BackupConfig, now: Date): string {
    const backupDir = this.ensureBackupDir(config.backupPath);
    return path.join(backupDir, formatFilename(config.filePrefix, now));
  }

  /** Removes an archive left behind by a failed dump. */
  cleanupFile(filePath: string): void {
    if (!fs.existsSync(filePath)) {
      return;
    }
    try {
      fs.unlinkSync(filePath);
      this.logger.info(`Cleaned up incomplete backup file: ${filePath}`);
    } catch (cleanupError: unknown) {
      const message = cleanupError instanceof Error ? cleanupError.message : String(cleanupError);
      this.logger.warn(`Failed to clean up incomplete backup file ${filePath}: ${message}`);
    }
  }

  private ensureBackupDir(backupPath: string): string {
    const backupDir = path.resolve(backupPath);
    if (!fs.existsSync(backupDir)) {
      fs.mkdirSync(backupDir, { recursive: true });
      this.logger.info(`Created backup directory: ${backupDir}`);
    }
    return backupDir;
  }
}
