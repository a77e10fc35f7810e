/**
 * Test logger that respects VERBOSE_TESTS environment variable
 *
 * By default, tests run silently. Set VERBOSE_TESTS=true to see all logs.
 */

export type Logger = {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
};

const isVerbose = process.env.VERBOSE_TESTS === "true";

const silent = (): void => undefined;

export const testLogger: Logger = {
  debug: isVerbose ? console.debug : silent,
  info: isVerbose ? console.info : silent,
  warn: isVerbose ? console.warn : silent,
  error: isVerbose ? console.error : silent,
};

// Logger that always outputs to console
export const consoleLogger: Logger = {
  debug: console.debug,
  info: console.info,
  warn: console.warn,
  error: console.error,
};
