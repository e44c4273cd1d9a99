/**
 * Provider client registry: builds clients from configuration and resolves them by id
 */

import type { IProviderConfig } from "../types/config.js";
import { logger } from "../utils/logger.js";
import { AiSdkClient } from "./ai-sdk-client.js";
import { OllamaClient } from "./ollama-client.js";
import type { IProviderClient } from "./types.js";

export class ProviderRegistry {
  private readonly clients = new Map<string, IProviderClient>();

  /**
   * Register a provider client under its id. A later registration replaces an earlier one.
   */
  register(client: IProviderClient): void {
    this.clients.set(client.id, client);
    logger.debug({ provider: client.id, kind: client.kind, model: client.model }, "Provider registered");
  }

  get(id: string): IProviderClient | undefined {
    return this.clients.get(id);
  }

  has(id: string): boolean {
    return this.clients.has(id);
  }

  /**
   * List all registered provider ids.
   */
  listProviders(): readonly string[] {
    return [...this.clients.keys()];
  }
}

/**
 * Build a client for one provider entry.
 */
export function createProviderClient(id: string, config: IProviderConfig): IProviderClient {
  switch (config.kind) {
    case "ollama":
      return new OllamaClient(id, config);
    case "anthropic":
    case "openai":
    case "google":
      return new AiSdkClient(id, config.kind, config);
  }
}

/**
 * Create a registry holding a client for every enabled provider.
 */
export function createProviderRegistry(providers: Readonly<Record<string, IProviderConfig>>): ProviderRegistry {
  const registry = new ProviderRegistry();

  for (const [id, config] of Object.entries(providers)) {
    if (!config.enabled) {
      logger.debug({ provider: id }, "Provider disabled, skipping");
      continue;
    }
    registry.register(createProviderClient(id, config));
  }

  return registry;
}
