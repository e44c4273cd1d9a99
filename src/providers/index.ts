/**
 * Provider clients barrel export
 */

export type { IProviderClient, IProviderOptions } from "./types.js";
export { AiSdkClient } from "./ai-sdk-client.js";
export type { HostedProviderKind } from "./ai-sdk-client.js";
export { OllamaClient } from "./ollama-client.js";
export { CircuitBreaker } from "./circuit-breaker.js";
export { ProviderRegistry, createProviderClient, createProviderRegistry } from "./registry.js";
