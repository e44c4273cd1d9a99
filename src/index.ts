/**
 * crewline public API
 */

export * from "./types/index.js";
export * from "./core/index.js";
export * from "./teams/index.js";
export * from "./providers/index.js";
export * from "./storage/index.js";
export * from "./transport/index.js";
export { logger } from "./utils/logger.js";
