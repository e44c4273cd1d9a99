/**
 * Coordinator configuration: one object built at startup and passed to every component
 */

import type { BudgetTier } from "./budget.js";
import type { ProviderKind } from "./provider.js";

// ── Provider Configuration ───────────────────────────────────────────────

export interface IProviderConfig {
  readonly kind: ProviderKind;
  readonly model: string;
  readonly enabled: boolean;
  readonly baseUrl?: string | undefined;
  /** Environment variable holding the API key; falls back to the SDK's default variable. */
  readonly apiKeyEnv?: string | undefined;
  readonly inputPricePerMToken: number;
  readonly outputPricePerMToken: number;
  readonly maxTokens?: number | undefined;
}

// ── Component Configuration ──────────────────────────────────────────────

export interface IBudgetConfig {
  readonly limitUsd: number;
  readonly periodMs: number;
  /** Ratios below this allow the premium tier. */
  readonly premiumBelow: number;
  /** Ratios above this allow only the local tier. */
  readonly localAbove: number;
}

export interface ICircuitBreakerConfig {
  readonly failureThreshold: number;
  readonly cooldownMs: number;
  readonly maxCooldownMs: number;
}

export interface IRetryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface ITimeoutConfig {
  readonly taskMs: number;
  readonly providerCallMs: number;
  readonly workflowMs: number;
  readonly dequeueMs: number;
}

export interface IHeartbeatConfig {
  readonly intervalMs: number;
  readonly timeoutMs: number;
}

export interface IPersistenceConfig {
  readonly enabled: boolean;
  /** ":memory:" is accepted. Defaults to ~/.crewline/db/crewline.db. */
  readonly databasePath?: string | undefined;
}

export interface ITransportConfig {
  readonly socketPath?: string | undefined;
  readonly secret?: string | undefined;
}

// ── Root Configuration ───────────────────────────────────────────────────

export interface ICoordinatorConfig {
  readonly budget: IBudgetConfig;
  readonly circuitBreaker: ICircuitBreakerConfig;
  readonly retry: IRetryConfig;
  readonly timeouts: ITimeoutConfig;
  readonly heartbeat: IHeartbeatConfig;
  readonly tiers: Readonly<Record<BudgetTier, readonly string[]>>;
  readonly providers: Readonly<Record<string, IProviderConfig>>;
  readonly persistence: IPersistenceConfig;
  readonly transport: ITransportConfig;
  readonly maxWorkflowHistory: number;
}

// ── Default Configuration ────────────────────────────────────────────────

export const DEFAULT_CONFIG: ICoordinatorConfig = {
  budget: {
    limitUsd: 140,
    periodMs: 30 * 24 * 60 * 60 * 1000,
    premiumBelow: 0.8,
    localAbove: 0.95,
  },
  circuitBreaker: {
    failureThreshold: 3,
    cooldownMs: 30_000,
    maxCooldownMs: 300_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 5_000,
    maxDelayMs: 60_000,
  },
  timeouts: {
    taskMs: 300_000,
    providerCallMs: 300_000,
    workflowMs: 3_600_000,
    dequeueMs: 1_000,
  },
  heartbeat: {
    intervalMs: 30_000,
    timeoutMs: 90_000,
  },
  tiers: {
    premium: ["claude-sonnet", "gpt-4o"],
    standard: ["gpt-4o-mini", "gemini-flash"],
    local: ["codellama"],
  },
  providers: {
    "claude-sonnet": {
      kind: "anthropic",
      model: "claude-3-5-sonnet-latest",
      enabled: true,
      inputPricePerMToken: 3,
      outputPricePerMToken: 15,
    },
    "gpt-4o": {
      kind: "openai",
      model: "gpt-4o",
      enabled: true,
      inputPricePerMToken: 2.5,
      outputPricePerMToken: 10,
    },
    "gpt-4o-mini": {
      kind: "openai",
      model: "gpt-4o-mini",
      enabled: true,
      inputPricePerMToken: 0.15,
      outputPricePerMToken: 0.6,
    },
    "gemini-flash": {
      kind: "google",
      model: "gemini-1.5-flash",
      enabled: true,
      inputPricePerMToken: 0.075,
      outputPricePerMToken: 0.3,
    },
    codellama: {
      kind: "ollama",
      model: "codellama:7b",
      enabled: true,
      baseUrl: "http://localhost:11434",
      inputPricePerMToken: 0,
      outputPricePerMToken: 0,
    },
  },
  persistence: {
    enabled: false,
  },
  transport: {},
  maxWorkflowHistory: 100,
};
