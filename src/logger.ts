/**
 * Logging to stderr, keeping stdout free for the caller.
 */

const PREFIX = '[relget]';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Emit debug messages */
  verbose: boolean;
  /** Line sink, defaults to console.error */
  write?: (line: string) => void;
}

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    debug(message) {
      if (options.verbose) {
        write(`${PREFIX} ${message}`);
      }
    },
    info(message) {
      write(`${PREFIX} ${message}`);
    },
    warn(message) {
      write(`${PREFIX} Warning: ${message}`);
    },
    error(message) {
      write(`${PREFIX} Error: ${message}`);
    },
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
