/**
 * @tanglekit/wallet — Logging.
 *
 * pino, JSON lines by default and pino-pretty in development. Fields that
 * could carry secrets are redacted wherever they appear.
 */

import pino from "pino";
import type { DestinationStream, LoggerOptions as PinoOptions } from "pino";
import type { Logger } from "@tanglekit/types";

export interface LoggerOptions {
  readonly level: string;
  readonly pretty?: boolean;
  /** Defaults to stdout; ignored when pretty. */
  readonly destination?: DestinationStream;
}

export const REDACTED_PATHS = ["passphrase", "seed", "privateKey", "*.passphrase", "*.seed", "*.privateKey"];

export function createLogger(options: LoggerOptions): Logger {
  const base: PinoOptions = {
    level: options.level,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  };
  if (options.pretty === true) {
    return pino({ ...base, transport: { target: "pino-pretty" } });
  }
  return options.destination !== undefined ? pino(base, options.destination) : pino(base);
}
