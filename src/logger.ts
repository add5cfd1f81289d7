import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Console logger. Warnings and errors go to stderr so that `--output json`
 * keeps stdout machine-readable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (options.verbose && !options.quiet) {
        console.error(chalk.gray(message));
      }
    },
    info(message) {
      if (!options.quiet) {
        console.log(message);
      }
    },
    warn(message) {
      console.error(chalk.yellow(`warn: ${message}`));
    },
    error(message) {
      console.error(chalk.red(`error: ${message}`));
    },
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
