/**
 * Storage layer barrel export
 */

export type { IPersistenceAdapter } from "./types.js";
export { SqlitePersistence } from "./sqlite-persistence.js";
export type { IStoredTaskResult } from "./sqlite-persistence.js";
export { ConfigStore, ConfigFileSchema, mergeConfig, checkConfig } from "./config-store.js";
export type { ConfigFile } from "./config-store.js";
