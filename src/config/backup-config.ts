import { z } from 'zod';
import type {
  AwsAuthMode,
  BackupConfig,
  EnvSource,
  MongoScopeConfig,
  ToolPaths,
  UploadTargetConfig,
} from '../types/mixed';
import { ConfigValidationError } from '../infrastructure/errors';
import { Logger } from '../infrastructure/logger';
import {
  AwsAuthModeSchema,
  BackupScopeSchema,
  BackupTargetSchema,
  RequiredValueSchema,
  RetentionDaysSchema,
} from './config.schema';

/**
 * Reads one variable through a schema. Unset and whitespace-only values are treated alike.
 * @throws ConfigValidationError naming the variable.
 */
function read<T extends z.ZodTypeAny>(env: EnvSource, name: string, schema: T): z.output<T> {
  const result = schema.safeParse((env[name] ?? '').trim());
  if (!result.success) {
    const reason = result.error.errors[0]?.message ?? 'is invalid';
    throw new ConfigValidationError(name, `${name} ${reason}`);
  }
  return result.data;
}

function required(env: EnvSource, name: string): string {
  return read(env, name, RequiredValueSchema);
}

function optional(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** AWS_AUTH is optional; an unset value means instance-role (`ec2`) credentials. */
function readAwsAuth(env: EnvSource): AwsAuthMode {
  return optional(env, 'AWS_AUTH') ? read(env, 'AWS_AUTH', AwsAuthModeSchema) : 'ec2';
}

/**
 * Validates the configuration values in a fixed order and stops at the first problem,
 * before any external command has run.
 *
 * Order: MONGO_URI, MONGO_SCOPE (+ MONGO_DB), MONGO_USERNAME, MONGO_PASSWORD, MONGO_AUTH_DB,
 * BACKUP_TARGET (+ AZURE_SAS_URI | AWS_S3_URI, AWS_REGION, AWS_AUTH), AWS_KEY, AWS_SECRET,
 * FILE_PREFIX, BACKUP_PATH, BACKUP_RETENTION.
 */
export function parseBackupConfig(env: EnvSource, logger: Logger): BackupConfig {
  const uri = required(env, 'MONGO_URI');

  const scope = read(env, 'MONGO_SCOPE', RequiredValueSchema.pipe(BackupScopeSchema));
  let scopeConfig: MongoScopeConfig;
  if (scope === 'specific') {
    logger.info('MongoDB backup scope set to SPECIFIC');
    const database = required(env, 'MONGO_DB');
    logger.info(`The specific database to be backed up is ${database}`);
    scopeConfig = { scope, database };
  } else {
    logger.info('MongoDB backup scope set to ALL databases');
    scopeConfig = { scope };
  }

  const username = required(env, 'MONGO_USERNAME');
  const password = required(env, 'MONGO_PASSWORD');
  const authenticationDatabase = required(env, 'MONGO_AUTH_DB');

  const subprocessEnv: Record<string, string> = {};
  const targetType = read(env, 'BACKUP_TARGET', RequiredValueSchema.pipe(BackupTargetSchema));
  let awsAuth: AwsAuthMode;
  let target: UploadTargetConfig;
  if (targetType === 'azure') {
    logger.info('Backup target is set to Azure Blob');
    target = { type: 'azure', sasUri: required(env, 'AZURE_SAS_URI') };
    // only an explicit iam still asks for the key pair
    awsAuth = optional(env, 'AWS_AUTH') === 'iam' ? 'iam' : 'ec2';
  } else {
    logger.info('Backup target is set to AWS S3');
    const s3Uri = required(env, 'AWS_S3_URI');
    const region = required(env, 'AWS_REGION');
    logger.info(`Setting AWS region to ${region}`);
    subprocessEnv.AWS_DEFAULT_REGION = region;
    awsAuth = readAwsAuth(env);
    target = { type: 'aws', s3Uri, region, auth: awsAuth };
  }

  if (awsAuth === 'iam') {
    subprocessEnv.AWS_ACCESS_KEY_ID = required(env, 'AWS_KEY');
    subprocessEnv.AWS_SECRET_ACCESS_KEY = required(env, 'AWS_SECRET');
    logger.info('Setting AWS credentials');
  }

  const filePrefix = required(env, 'FILE_PREFIX');
  const backupPath = required(env, 'BACKUP_PATH');
  const retentionDays = read(env, 'BACKUP_RETENTION', RequiredValueSchema.pipe(RetentionDaysSchema));

  const tools: ToolPaths = {
    mongodump: optional(env, 'MONGODUMP_PATH') ?? 'mongodump',
    aws: optional(env, 'AWS_CLI_PATH') ?? 'aws',
    azcopy: optional(env, 'AZCOPY_PATH') ?? 'azcopy',
  };

  return {
    mongo: { ...scopeConfig, uri, username, password, authenticationDatabase },
    target,
    filePrefix,
    backupPath,
    retentionDays,
    tools,
    subprocessEnv,
  };
}
