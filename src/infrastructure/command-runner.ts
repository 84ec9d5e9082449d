import { spawn } from 'child_process';
import { CommandFailedError } from './errors';
import { Logger } from './logger';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Variables added on top of the parent process environment. */
  env?: Record<string, string>;
}

export interface CommandRunner {
  /**
   * Runs an executable to completion.
   * @returns Captured output when the process exits with code 0.
   * @throws CommandFailedError on spawn failure or non-zero exit.
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Runs commands with `child_process.spawn` (no shell). There is no timeout: a hung tool hangs the run.
 */
export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env ? { ...process.env, ...options.env } : process.env,
    });

    return new Promise<CommandResult>((resolve, reject) => {
      let stdoutData = '';
      let stderrData = '';

      child.stdout.on('data', (data: Buffer) => {
        stdoutData += data.toString();
      });

      // mongodump, aws and azcopy all report progress on stderr
      child.stderr.on('data', (data: Buffer) => {
        stderrData += data.toString();
        this.logger.debug(`${command}: ${data.toString().trim()}`);
      });

      child.on('error', (error) => {
        reject(new CommandFailedError(command, null, stderrData, error));
      });

      child.on('close', (code) => {
        if (code === 0) {
          resolve({ stdout: stdoutData, stderr: stderrData });
        } else {
          reject(new CommandFailedError(command, code, stderrData));
        }
      });
    });
  }
}
