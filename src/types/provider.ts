/**
 * Provider health and generation types
 */

export type ProviderKind = "anthropic" | "openai" | "google" | "ollama";

export type CircuitState = "closed" | "open" | "half_open";

export interface IProviderHealth {
  readonly provider: string;
  readonly consecutiveFailures: number;
  readonly circuitState: CircuitState;
  readonly openedAt?: Date | undefined;
  readonly cooldownMs: number;
}

export interface IGenerateParams {
  readonly model?: string | undefined;
  readonly system?: string | undefined;
  readonly maxTokens?: number | undefined;
  readonly temperature?: number | undefined;
  readonly signal?: AbortSignal | undefined;
}

export interface IGenerateResult {
  readonly text: string;
  readonly model: string;
  readonly costUsd: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
}
