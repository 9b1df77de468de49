/* eslint-disable no-console */

export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger that prefixes every line with its scope, e.g.
 * `[Triage][Fetcher] Fetching bug report...`. Debug lines only show up in
 * verbose mode.
 */
export function createLogger(
  scope: string,
  options: LoggerOptions = {}
): Logger {
  const prefix = `[Triage][${scope}]`;
  const verbose = options.verbose ?? false;

  return {
    debug(message, ...rest) {
      if (!verbose) return;
      console.debug(`${prefix} ${message}`, ...rest);
    },
    info(message, ...rest) {
      console.log(`${prefix} ${message}`, ...rest);
    },
    warn(message, ...rest) {
      console.warn(`${prefix} ${message}`, ...rest);
    },
    error(message, ...rest) {
      console.error(`${prefix} ${message}`, ...rest);
    },
    child(childScope) {
      return createLogger(`${scope}][${childScope}`, options);
    },
  };
}

export function createSilentLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
