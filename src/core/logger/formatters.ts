/**
 * Logger Formatters
 * Custom Pino formatters for structured logging
 */

import type { LoggerOptions } from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration
 */
export function createFormatter(config: LoggerConfig): NonNullable<LoggerOptions["formatters"]> {
  return {
    level: (label: string) => {
      return { level: label };
    },

    log: (obj: Record<string, unknown>) => {
      // Add source information if configured
      if (config.source) {
        obj.source = config.source;
      }

      return obj;
    },
  };
}
