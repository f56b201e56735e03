/**
 * @module config/logger
 * @description pino logger factory.
 *
 * Components accept an optional `Logger` and derive a child tagged with
 * their component name. When none is given they fall back to a silent
 * logger so the library stays quiet when embedded.
 */

import { pino } from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  /** Minimum level. Default: "info". */
  level?: LevelWithSilent;
  /** Logger name, printed on every line. Default: "beacon-safe-zone". */
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "beacon-safe-zone",
    level: options.level ?? "info",
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

const SILENT: Logger = pino({ level: "silent" });

/**
 * Derive a component logger, or a silent one when no parent is supplied.
 */
export function componentLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? SILENT).child({ component });
}
