/**
 * memtree configuration
 *
 * Sources, later ones winning: defaults, memtree.config.json in the working
 * directory, MEMTREE_* environment variables, explicit overrides (CLI flags).
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";

export const CONFIG_FILE_NAME = "memtree.config.json";

const LoggerSectionSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("warn"),
    format: z.enum(["json", "pretty"]).default("pretty"),
  })
  .strict();

export const ConfigSchema = z
  .object({
    duplicatePolicy: z.enum(["overwrite", "reject"]).default("reject"),
    logger: LoggerSectionSchema.default({}),
  })
  .strict();

export type MemtreeConfig = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
  duplicatePolicy?: string;
  logLevel?: string;
  logFormat?: string;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

function parse(value: unknown, source: string): MemtreeConfig {
  const result = ConfigSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(`${where}${issue?.message ?? "invalid value"}`, source);
  }
  return result.data;
}

function readConfigFile(file: string): unknown {
  if (!fs.existsSync(file)) return {};
  const raw = fs.readFileSync(file, "utf8");
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`cannot parse JSON (${e instanceof Error ? e.message : String(e)})`, file);
  }
}

export function defaultConfig(): MemtreeConfig {
  return parse({}, "defaults");
}

export function loadConfig(options: LoadConfigOptions = {}): MemtreeConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const file = path.join(cwd, CONFIG_FILE_NAME);
  const fromFile = parse(readConfigFile(file), file);

  return parse(
    {
      duplicatePolicy:
        overrides.duplicatePolicy ?? env.MEMTREE_DUPLICATE_POLICY ?? fromFile.duplicatePolicy,
      logger: {
        level: overrides.logLevel ?? env.MEMTREE_LOG_LEVEL ?? fromFile.logger.level,
        format: overrides.logFormat ?? env.MEMTREE_LOG_FORMAT ?? fromFile.logger.format,
      },
    },
    "environment"
  );
}
