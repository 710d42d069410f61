/**
 * memtree public API
 */

export * from "./core/tree";
export * from "./core/errors";
export { EventBus } from "./core/eventBus";
export type { DirectoryChange, EventBusConfig, EventInit, EventType, TreeEvent } from "./core/eventBus";
export * from "./core/logger";
export { CONFIG_FILE_NAME, ConfigSchema, defaultConfig, loadConfig } from "./core/config";
export type { ConfigOverrides, LoadConfigOptions, MemtreeConfig } from "./core/config";
