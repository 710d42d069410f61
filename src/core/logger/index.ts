/**
 * memtree logger - Pino-based logging system
 *
 * Features:
 * - Structured JSON logging with Pino
 * - Pretty printing through pino-pretty for terminals
 * - Child loggers carrying per-store or per-command context
 */

import type { DestinationStream } from "pino";
import { LoggerConfig } from "./config";
import { TreeLogger } from "./logger";

export { TreeLogger } from "./logger";
export type { LogContext } from "./logger";
export {
  createLoggerConfig,
  isValidLogLevel,
  parseLogFormat,
  parseLogLevel,
  LOG_LEVELS,
} from "./config";
export type { LogFormat, LogLevel, LoggerConfig } from "./config";

export function createLogger(config: Partial<LoggerConfig> = {}, destination?: DestinationStream): TreeLogger {
  return new TreeLogger(config, destination);
}

/**
 * Logger that writes nothing; for hosts that want the store quiet.
 */
export function silentLogger(): TreeLogger {
  return new TreeLogger({ level: "silent", format: "json" });
}
