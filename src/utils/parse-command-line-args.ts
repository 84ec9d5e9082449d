import type { CommandLineArgs } from '../types/mixed';

export const USAGE = `Usage: mongo-archive-shipper [options]

Dumps MongoDB to a gzip archive, uploads it to AWS S3 or Azure Blob and prunes old local archives.

Options:
  --env-file=<path>  Environment file to load (default: ~/mongo-backup.env)
  --debug            Print debug output, including subprocess progress
  -h, --help         Show this help
`;

/**
 * Parses the arguments passed after the executable.
 * @throws Error on an unknown option.
 */
export function parseCommandLineArgs(argv: string[] = process.argv.slice(2)): CommandLineArgs {
  const result: CommandLineArgs = { debug: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--debug') {
      result.debug = true;
      continue;
    }

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      continue;
    }

    if (arg.startsWith('--env-file=')) {
      result.envFile = arg.slice('--env-file='.length);
      continue;
    }

    if (arg === '--env-file') {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new Error('--env-file requires a path');
      }
      result.envFile = value;
      i++;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return result;
}
