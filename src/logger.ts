/**
 * Minimal leveled logger. Components take one as an option so hosts can route
 * diagnostics anywhere and tests can silence or inspect them.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a console-backed logger whose lines are prefixed with `[scope]`.
 *
 * @example
 * ```typescript
 * const log = createLogger("HOST");
 * log.info("Session created", session.id); // [HOST] Session created 3f2a...
 * ```
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: console.debug.bind(console, prefix),
    info: console.log.bind(console, prefix),
    warn: console.warn.bind(console, prefix),
    error: console.error.bind(console, prefix),
  };
}

const noop = () => {};

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
