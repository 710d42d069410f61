/**
 * src/cli/utils/createStore.ts
 * Shared store flags and construction for CLI commands
 */

import { Command } from "commander";
import { loadConfig } from "../../core/config";
import { createLogger, type TreeLogger } from "../../core/logger";
import { FileSystem } from "../../core/tree";

export interface StoreFlags {
  overwrite?: boolean;
  logLevel?: string;
  logFormat?: string;
}

export function addStoreOptions(cmd: Command): Command {
  return cmd
    .option("--overwrite", "replace entries on name clashes instead of failing")
    .option("--log-level <level>", "fatal|error|warn|info|debug|trace|silent")
    .option("--log-format <format>", "json|pretty");
}

export function createStore(flags: StoreFlags, cwd: string = process.cwd()): { store: FileSystem; logger: TreeLogger } {
  const config = loadConfig({
    cwd,
    overrides: {
      duplicatePolicy: flags.overwrite ? "overwrite" : undefined,
      logLevel: flags.logLevel,
      logFormat: flags.logFormat,
    },
  });
  const logger = createLogger({ ...config.logger, source: "cli" });
  return {
    store: new FileSystem({ duplicatePolicy: config.duplicatePolicy, logger }),
    logger,
  };
}
