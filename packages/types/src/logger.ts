/**
 * Logger seam.
 *
 * The subset of a structured logger the engine writes to. pino loggers
 * satisfy it; tests pass NOOP_LOGGER or a spy.
 */

export interface LogMethod {
  (fields: Record<string, unknown>, message?: string): void;
}

export interface Logger {
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
  child(bindings: Record<string, unknown>): Logger;
}

const noop: LogMethod = () => {};

export const NOOP_LOGGER: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  child: () => NOOP_LOGGER,
};
