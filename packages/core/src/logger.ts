/**
 * Logging for the profiler.
 * Every line carries an ISO 8601 timestamp and a scope prefix, e.g.
 * `[2026-01-03T16:45:23.123Z] [taskscope] Backend "inspector" unavailable`.
 */

export interface ProfilerLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Logger writing through console.* with timestamp and scope prefixes.
 * Debug output is only written when `verbose` is set.
 */
export function createConsoleLogger(
  scope = "taskscope",
  verbose = false
): ProfilerLogger {
  const prefix = (): string => `[${formatTimestamp()}] [${scope}]`;

  return {
    debug(message) {
      if (verbose) {
        console.debug(prefix(), message);
      }
    },
    info(message) {
      console.log(prefix(), message);
    },
    warn(message) {
      console.warn(prefix(), message);
    },
    error(message) {
      console.error(prefix(), message);
    },
  };
}

/** Logger that drops everything. */
export function createSilentLogger(): ProfilerLogger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}
