import { parseBackupConfig } from '../../src/config/backup-config';
import { ConfigValidationError } from '../../src/infrastructure/errors';
import type { EnvSource } from '../../src/types/mixed';
import { awsEc2Env } from '../helpers/env';
import { quietLogger } from '../helpers/logger';

const logger = quietLogger();

function failureOf(env: EnvSource): ConfigValidationError {
  try {
    parseBackupConfig(env, logger);
  } catch (error: unknown) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected configuration to be rejected');
}

describe('parseBackupConfig', () => {
  it('builds the configuration for an all-databases backup to S3 with instance credentials', () => {
    const config = parseBackupConfig(awsEc2Env('/var/backups/mongo'), logger);

    expect(config).toEqual({
      mongo: {
        scope: 'all',
        uri: 'mongodb://db.internal:27017',
        username: 'backup',
        password: 'test-password',
        authenticationDatabase: 'admin',
      },
      target: { type: 'aws', s3Uri: 's3://test-bucket/mongo/', region: 'eu-west-1', auth: 'ec2' },
      filePrefix: 'nightly',
      backupPath: '/var/backups/mongo',
      retentionDays: 7,
      tools: { mongodump: 'mongodump', aws: 'aws', azcopy: 'azcopy' },
      subprocessEnv: { AWS_DEFAULT_REGION: 'eu-west-1' },
    });
  });

  it.each([
    'MONGO_URI',
    'MONGO_SCOPE',
    'MONGO_USERNAME',
    'MONGO_PASSWORD',
    'MONGO_AUTH_DB',
    'BACKUP_TARGET',
    'FILE_PREFIX',
    'BACKUP_PATH',
    'BACKUP_RETENTION',
  ])('rejects a configuration without %s', (name) => {
    const error = failureOf(awsEc2Env('/backups', { [name]: undefined }));

    expect(error.variable).toBe(name);
    expect(error.message).toBe(`${name} must be set`);
  });

  it('treats whitespace-only values as unset', () => {
    expect(failureOf(awsEc2Env('/backups', { MONGO_USERNAME: '   ' })).variable).toBe('MONGO_USERNAME');
  });

  it('reports only the first missing value in validation order', () => {
    const error = failureOf(awsEc2Env('/backups', { FILE_PREFIX: undefined, MONGO_PASSWORD: undefined }));

    expect(error.variable).toBe('MONGO_PASSWORD');
  });

  it('rejects an unknown scope', () => {
    const error = failureOf(awsEc2Env('/backups', { MONGO_SCOPE: 'some' }));

    expect(error.variable).toBe('MONGO_SCOPE');
    expect(error.message).toBe("MONGO_SCOPE must be either 'all' or 'specific'");
  });

  describe('specific scope', () => {
    it('requires MONGO_DB', () => {
      const error = failureOf(awsEc2Env('/backups', { MONGO_SCOPE: 'specific' }));

      expect(error.variable).toBe('MONGO_DB');
    });

    it('checks MONGO_DB before the credentials', () => {
      const error = failureOf(awsEc2Env('/backups', { MONGO_SCOPE: 'specific', MONGO_USERNAME: undefined }));

      expect(error.variable).toBe('MONGO_DB');
    });

    it('keeps the named database', () => {
      const config = parseBackupConfig(awsEc2Env('/backups', { MONGO_SCOPE: 'specific', MONGO_DB: 'orders' }), logger);

      expect(config.mongo).toMatchObject({ scope: 'specific', database: 'orders' });
    });
  });

  describe('targets', () => {
    it('rejects an unknown target instead of skipping the upload', () => {
      const error = failureOf(awsEc2Env('/backups', { BACKUP_TARGET: 'gcs' }));

      expect(error.variable).toBe('BACKUP_TARGET');
      expect(error.message).toBe("BACKUP_TARGET must be either 'aws' or 'azure'");
    });

    it('requires AZURE_SAS_URI for azure', () => {
      const error = failureOf(awsEc2Env('/backups', { BACKUP_TARGET: 'azure' }));

      expect(error.variable).toBe('AZURE_SAS_URI');
    });

    it('builds an azure target without exporting AWS variables', () => {
      const config = parseBackupConfig(
        awsEc2Env('/backups', {
          BACKUP_TARGET: 'azure',
          AZURE_SAS_URI: 'https://acct.blob.core.windows.net/backups?sv=2022&sig=test-signature',
        }),
        logger,
      );

      expect(config.target).toEqual({
        type: 'azure',
        sasUri: 'https://acct.blob.core.windows.net/backups?sv=2022&sig=test-signature',
      });
      expect(config.subprocessEnv).toEqual({});
    });

    it('ignores an AWS_AUTH value the azure target has no use for', () => {
      const config = parseBackupConfig(
        awsEc2Env('/backups', { BACKUP_TARGET: 'azure', AZURE_SAS_URI: 'https://acct.blob.core.windows.net/b', AWS_AUTH: 'sso' }),
        logger,
      );

      expect(config.target.type).toBe('azure');
      expect(config.subprocessEnv).toEqual({});
    });

    it('still requires the key pair for azure when AWS_AUTH is iam', () => {
      const error = failureOf(
        awsEc2Env('/backups', { BACKUP_TARGET: 'azure', AZURE_SAS_URI: 'https://acct.blob.core.windows.net/b', AWS_AUTH: 'iam' }),
      );

      expect(error.variable).toBe('AWS_KEY');
    });

    it('requires AWS_S3_URI before AWS_REGION', () => {
      const error = failureOf(awsEc2Env('/backups', { AWS_S3_URI: undefined, AWS_REGION: undefined }));

      expect(error.variable).toBe('AWS_S3_URI');
    });

    it('requires AWS_REGION for aws', () => {
      expect(failureOf(awsEc2Env('/backups', { AWS_REGION: undefined })).variable).toBe('AWS_REGION');
    });

    it('defaults AWS_AUTH to instance-role credentials', () => {
      const config = parseBackupConfig(awsEc2Env('/backups', { AWS_AUTH: undefined }), logger);

      expect(config.target).toMatchObject({ type: 'aws', auth: 'ec2' });
    });

    it('rejects an unknown AWS_AUTH', () => {
      const error = failureOf(awsEc2Env('/backups', { AWS_AUTH: 'sso' }));

      expect(error.variable).toBe('AWS_AUTH');
      expect(error.message).toBe("AWS_AUTH must be either 'ec2' or 'iam'");
    });
  });

  describe('iam credentials', () => {
    it('requires AWS_KEY', () => {
      const error = failureOf(awsEc2Env('/backups', { AWS_AUTH: 'iam', AWS_SECRET: 'test-secret' }));

      expect(error.variable).toBe('AWS_KEY');
    });

    it('requires AWS_SECRET', () => {
      const error = failureOf(awsEc2Env('/backups', { AWS_AUTH: 'iam', AWS_KEY: 'test-key' }));

      expect(error.variable).toBe('AWS_SECRET');
    });

    it('exports the key pair for the AWS CLI', () => {
      const config = parseBackupConfig(
        awsEc2Env('/backups', { AWS_AUTH: 'iam', AWS_KEY: 'test-key', AWS_SECRET: 'test-secret' }),
        logger,
      );

      expect(config.subprocessEnv).toEqual({
        AWS_DEFAULT_REGION: 'eu-west-1',
        AWS_ACCESS_KEY_ID: 'test-key',
        AWS_SECRET_ACCESS_KEY: 'test-secret',
      });
    });
  });

  it.each(['seven', '-1', '1.5'])('rejects BACKUP_RETENTION=%s', (value) => {
    const error = failureOf(awsEc2Env('/backups', { BACKUP_RETENTION: value }));

    expect(error.variable).toBe('BACKUP_RETENTION');
    expect(error.message).toBe('BACKUP_RETENTION must be a whole number of days');
  });

  it('rejects a retention window beyond the supported range before anything runs', () => {
    const error = failureOf(awsEc2Env('/backups', { BACKUP_RETENTION: '200000000' }));

    expect(error.variable).toBe('BACKUP_RETENTION');
    expect(error.message).toBe('BACKUP_RETENTION must be at most 36500 days');
  });

  it('accepts the largest supported retention window', () => {
    expect(parseBackupConfig(awsEc2Env('/backups', { BACKUP_RETENTION: '36500' }), logger).retentionDays).toBe(36500);
  });

  it('accepts a zero-day retention', () => {
    expect(parseBackupConfig(awsEc2Env('/backups', { BACKUP_RETENTION: '0' }), logger).retentionDays).toBe(0);
  });

  it('takes tool locations from the environment', () => {
    const config = parseBackupConfig(
      awsEc2Env('/backups', {
        MONGODUMP_PATH: '/opt/mongo/bin/mongodump',
        AWS_CLI_PATH: '/usr/local/bin/aws',
        AZCOPY_PATH: '/opt/azcopy',
      }),
      logger,
    );

    expect(config.tools).toEqual({
      mongodump: '/opt/mongo/bin/mongodump',
      aws: '/usr/local/bin/aws',
      azcopy: '/opt/azcopy',
    });
  });
});
