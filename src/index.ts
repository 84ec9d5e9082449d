#!/usr/bin/env node
import 'source-map-support/register';
import { parseCommandLineArgs, USAGE } from './utils/parse-command-line-args';
import { loadEnvironment } from './infrastructure/environment';
import { SpawnCommandRunner } from './infrastructure/command-runner';
import { Logger } from './infrastructure/logger';
import { BackupRunner } from './core/backup-runner';

async function main(): Promise<void> {
  const args = parseCommandLineArgs();
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const logger = new Logger({ debug: args.debug, prefix: 'mongo-backup' });
  try {
    const env = loadEnvironment(args.envFile, logger);
    const runner = new BackupRunner({ env, runner: new SpawnCommandRunner(logger.child('exec')), logger });
    await runner.run();
  } catch (error: unknown) {
    logger.error(error instanceof Error ? error : String(error));
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error('\nApplication Error:', message);
  process.exit(1);
});
