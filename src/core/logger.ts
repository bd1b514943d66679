/**
 * Diagnostic logging.
 *
 * Lines go to stderr as `[Scope] message` so stdout stays free for the CLI's
 * result. This is separate from the progress reporter a caller passes to the
 * projector.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
}

export function createConsoleLogger(scope: string, options: ConsoleLoggerOptions = {}): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message) {
      if (options.verbose) {
        console.error(`${prefix} ${message}`);
      }
    },
    info(message) {
      console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.error(`${prefix} Warning: ${message}`);
    },
    error(message) {
      console.error(`${prefix} Error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
