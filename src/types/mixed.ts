export type AwsAuthMode = 'ec2' | 'iam';

export type MongoScopeConfig = { scope: 'all' } | { scope: 'specific'; database: string };

export type MongoConnectionConfig = MongoScopeConfig & {
  uri: string;
  username: string;
  password: string;
  authenticationDatabase: string;
};

export interface AwsTargetConfig {
  type: 'aws';
  /** Bucket URI the archive is copied under, e.g. `s3://bucket/mongo/`. */
  s3Uri: string;
  region: string;
  auth: AwsAuthMode;
}

export interface AzureTargetConfig {
  type: 'azure';
  /** Container URI carrying a Shared Access Signature query string. */
  sasUri: string;
}

export type UploadTargetConfig = AwsTargetConfig | AzureTargetConfig;

export interface ToolPaths {
  mongodump: string;
  aws: string;
  azcopy: string;
}

export interface BackupConfig {
  mongo: MongoConnectionConfig;
  target: UploadTargetConfig;
  filePrefix: string;
  backupPath: string;
  retentionDays: number;
  tools: ToolPaths;
  /** Variables exported to the cloud CLI subprocesses (region, IAM credentials). */
  subprocessEnv: Record<string, string>;
}

/** Raw name/value pairs the configuration is read from. */
export type EnvSource = Record<string, string | undefined>;

export type BackupPhase = 'validating' | 'dumping' | 'uploading' | 'cleaning' | 'done' | 'failed';

export interface BackupResult {
  archivePath: string;
  /** Where the archive was copied, with secrets masked. */
  destination: string;
  removedFiles: string[];
}

export interface CommandLineArgs {
  envFile?: string;
  debug: boolean;
  help: boolean;
}
