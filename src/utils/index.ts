/**
 * Utilities barrel export
 */

export { logger } from "./logger.js";
export { estimateTokenCount, calculateCost, formatCost } from "./tokenCounter.js";
export type { IModelPricing } from "./tokenCounter.js";
export {
  getCrewlineHome,
  getConfigPath,
  getDatabasePath,
  getProjectConfigPath,
  getSocketPath,
  ensureDirectory,
  ensureSecureDirectory,
  findProjectRoot,
} from "./pathResolver.js";
export { backoffDelay, withTimeout } from "./retry.js";
export type { IBackoffOptions } from "./retry.js";
