/**
 * Operational logging for the server.
 *
 * Messages go to stderr so stdout stays free for command output.
 * @module logger
 */

/**
 * Minimal logger used by the HTTP server.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Suppress all output */
  quiet?: boolean;
  /** Prefix for every line (e.g. "[item-store]") */
  prefix?: string;
}

/**
 * Create a logger writing to stderr.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ prefix: '[item-store]' });
 * logger.info('listening'); // "[item-store] listening"
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  if (options.quiet) {
    return { info() {}, warn() {}, error() {} };
  }

  const format = (message: string): string =>
    options.prefix ? `${options.prefix} ${message}` : message;

  return {
    info(message) {
      console.error(format(message));
    },
    warn(message) {
      console.error(format(`Warning: ${message}`));
    },
    error(message, error) {
      if (error === undefined) {
        console.error(format(`Error: ${message}`));
      } else {
        console.error(format(`Error: ${message}`), error);
      }
    },
  };
}
