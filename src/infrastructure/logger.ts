import ora, { Ora } from 'ora';
import chalk from 'chalk';

export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
}

export interface SpinnerHolder {
  current: Ora | null;
}

export class Logger {
  private readonly isDebugEnabled: boolean;
  private readonly prefix: string;

  /**
   * Creates an instance of Logger.
   * @param options.debug - Enable debug logging (default: false).
   * @param options.prefix - Label printed in front of every line.
   * @param spinnerHolder - Spinner slot shared with the parent logger.
   */
  constructor(
    options: LoggerOptions = {},
    private readonly spinnerHolder: SpinnerHolder = { current: null },
  ) {
    this.isDebugEnabled = options.debug ?? false;
    this.prefix = options.prefix ?? '';
  }

  /**
   * Returns a logger with `> name` appended to the prefix. Parent and child share one spinner,
   * so a line logged by either pauses whichever spinner is running.
   */
  child(name: string): Logger {
    return new Logger(
      {
        debug: this.isDebugEnabled,
        prefix: this.prefix ? `${this.prefix} > ${name}` : name,
      },
      this.spinnerHolder,
    );
  }

  get spinner(): Ora | null {
    return this.spinnerHolder.current;
  }

  set spinner(value: Ora | null) {
    this.spinnerHolder.current = value;
  }

  /**
   * Logs an informational message.
   * Stops the spinner temporarily if active.
   */
  info(...messages: unknown[]): void {
    const formattedMessage = messages.map((msg) => `${this.label()} ${chalk.blue(msg)}`).join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.stopAndPersist({ text: formattedMessage, symbol: 'ℹ️' });
      this.spinner = null;
    } else {
      console.info(formattedMessage);
    }
  }

  /**
   * Logs a warning message.
   * Stops the spinner temporarily if active.
   */
  warn(...messages: unknown[]): void {
    const formattedMessage = messages.map((msg) => `${this.label()} ${chalk.yellow(msg)}`).join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.warn(formattedMessage);
      this.spinner = null;
    } else {
      console.warn(`⚠️ ${formattedMessage}`);
    }
  }

  /**
   * Logs an error message.
   * Fails the spinner if active. Stack traces are printed in debug mode only.
   */
  error(...messages: unknown[]): void {
    const formattedMessages = messages
      .map((msg) => (msg instanceof Error ? msg.message : msg))
      .map((msg) => `${this.label()} ${chalk.red(msg)}`)
      .join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.fail(formattedMessages);
      this.spinner = null;
    } else {
      console.error(`✖ ${formattedMessages}`);
    }

    messages.forEach((msg) => {
      if (msg instanceof Error && msg.stack && this.isDebugEnabled) {
        console.error(chalk.red(msg.stack));
      }
    });
  }

  /**
   * Logs a debug message only if debug mode is enabled.
   */
  debug(...messages: unknown[]): void {
    if (!this.isDebugEnabled) {
      return;
    }
    const formattedMessage = messages.map((msg) => `${this.label()} ${chalk.grey(`[Debug] ${msg}`)}`).join(' ');

    if (this.spinner?.isSpinning) {
      this.spinner.stop();
      console.debug(formattedMessage);
      this.spinner.start();
    } else {
      console.debug(formattedMessage);
    }
  }

  /**
   * Starts a new spinner, stopping the previous one first.
   */
  startSpinner(message: string): void {
    if (this.spinner?.isSpinning) {
      this.spinner.stop();
    }
    this.spinner = ora(`${this.label()} ${message}`).start();
  }

  /**
   * Stops the active spinner with a success symbol (✔).
   * Without a running spinner (e.g. output is not a TTY) the message is printed as a plain line.
   */
  succeedSpinner(message: string): void {
    const text = `${this.label()} ${chalk.green(message)}`;
    if (this.spinner?.isSpinning) {
      this.spinner.succeed(text);
    } else {
      console.info(`✔ ${text}`);
    }
    this.spinner = null;
  }

  /**
   * Stops the active spinner with a failure symbol (✖).
   */
  failSpinner(message: string): void {
    const text = `${this.label()} ${chalk.red(message)}`;
    if (this.spinner?.isSpinning) {
      this.spinner.fail(text);
    } else {
      console.error(`✖ ${text}`);
    }
    this.spinner = null;
  }

  private label(): string {
    return chalk.green(`[${this.prefix}]`);
  }
}
