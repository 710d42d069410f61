/**
 * memtree Logger - Pino-based Structured Logging
 * Pretty dev output or JSON lines, written synchronously
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { createLoggerConfig, LoggerConfig, LogLevel } from "./config";
import { createFormatter } from "./formatters";

export interface LogContext {
  path?: string;
  operation?: string;
  code?: string;
  [key: string]: unknown;
}

function createDestination(config: LoggerConfig): pino.DestinationStream {
  if (config.format === "pretty") {
    return pinoPretty({
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname,source",
      sync: true,
    });
  }
  return pino.destination({ dest: 1, sync: true });
}

export class TreeLogger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;
  private destination: pino.DestinationStream;

  constructor(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream) {
    this.config = createLoggerConfig(config);
    this.destination = destination ?? createDestination(this.config);
    this.pinoLogger = pino(
      {
        level: this.config.level,
        formatters: createFormatter(this.config),
        serializers: {
          err: pino.stdSerializers.err,
        },
      },
      this.destination
    );
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): TreeLogger {
    const childLogger = new TreeLogger(this.config, this.destination);
    childLogger.pinoLogger = this.pinoLogger.child(context);
    return childLogger;
  }

  trace(message: string, context?: LogContext): void {
    this.pinoLogger.trace(context || {}, message);
  }

  debug(message: string, context?: LogContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LogContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LogContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  /**
   * Check if level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  /**
   * Get current configuration
   */
  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}
