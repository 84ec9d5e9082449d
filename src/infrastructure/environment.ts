import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as dotenv from 'dotenv';
import type { EnvSource } from '../types/mixed';
import { ConfigValidationError } from './errors';
import { Logger } from './logger';

export const DEFAULT_ENV_FILE = path.join(os.homedir(), 'mongo-backup.env');

/**
 * Merges the variables of an env file over `baseEnv`; values from the file win.
 *
 * @param envFile - Explicit file path. When given it must exist; when omitted the default
 *   `~/mongo-backup.env` is read if present.
 */
export function loadEnvironment(
  envFile: string | undefined,
  logger: Logger,
  baseEnv: EnvSource = process.env,
): EnvSource {
  const filePath = path.resolve(envFile ?? DEFAULT_ENV_FILE);

  if (!fs.existsSync(filePath)) {
    if (envFile) {
      throw new ConfigValidationError('--env-file', `Environment file not found at ${filePath}`);
    }
    logger.warn(`No environment file at ${filePath}, using the process environment only`);
    return { ...baseEnv };
  }

  logger.info(`Loading environment from: ${filePath}`);
  const parsed = dotenv.parse(fs.readFileSync(filePath, 'utf8'));
  logger.debug(`Read ${Object.keys(parsed).length} variable(s)`);
  return { ...baseEnv, ...parsed };
}
