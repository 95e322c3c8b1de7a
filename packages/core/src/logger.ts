/**
 * Logging contract shared by the core and its hosts.
 *
 * The core never writes to the console itself; the CLI supplies a
 * chalk-backed implementation and tests use silentLogger.
 */

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

/**
 * Silent logger (for tests or embedding)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
