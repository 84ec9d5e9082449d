/**
 * Raised when a configuration value is missing or malformed.
 * Always names the single variable that failed.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Raised when an external tool could not be started or exited with a non-zero status.
 */
export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string,
    cause?: Error,
  ) {
    super(
      cause
        ? `${command} could not be started: ${cause.message}`
        : `${command} exited with code ${exitCode}${stderr ? `. stderr: ${lastLines(stderr, 5)}` : ''}`,
    );
    this.name = 'CommandFailedError';
  }
}

function lastLines(text: string, count: number): string {
  return text.trim().split('\n').slice(-count).join('\n');
}
