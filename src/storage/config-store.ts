/**
 * Configuration store.
 * Loads the global and project config files with Zod validation and merges
 * them, section by section, over DEFAULT_CONFIG (project wins).
 * An unreadable or invalid layer is ignored with a warning.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { ensureSecureDirectory, getConfigPath, getProjectConfigPath } from "../utils/pathResolver.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import type { ICoordinatorConfig } from "../types/config.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const ProviderConfigSchema = z.object({
  kind: z.enum(["anthropic", "openai", "google", "ollama"]),
  model: z.string().min(1),
  enabled: z.boolean().default(true),
  baseUrl: z.string().url().optional(),
  apiKeyEnv: z.string().min(1).optional(),
  inputPricePerMToken: z.number().nonnegative().default(0),
  outputPricePerMToken: z.number().nonnegative().default(0),
  maxTokens: z.number().int().positive().optional(),
});

const BudgetConfigSchema = z.object({
  limitUsd: z.number().positive(),
  periodMs: z.number().int().positive(),
  premiumBelow: z.number().gt(0).lte(1),
  localAbove: z.number().gt(0).lte(1),
});

const CircuitBreakerConfigSchema = z.object({
  failureThreshold: z.number().int().min(1),
  cooldownMs: z.number().int().positive(),
  maxCooldownMs: z.number().int().positive(),
});

const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).max(100),
  baseDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
});

const TimeoutConfigSchema = z.object({
  taskMs: z.number().int().positive(),
  providerCallMs: z.number().int().positive(),
  workflowMs: z.number().int().positive(),
  dequeueMs: z.number().int().positive(),
});

const HeartbeatConfigSchema = z.object({
  intervalMs: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
});

const TierChainSchema = z.array(z.string().min(1));

/** Every section optional, every field within a section optional. */
export const ConfigFileSchema = z.object({
  budget: BudgetConfigSchema.partial().optional(),
  circuitBreaker: CircuitBreakerConfigSchema.partial().optional(),
  retry: RetryConfigSchema.partial().optional(),
  timeouts: TimeoutConfigSchema.partial().optional(),
  heartbeat: HeartbeatConfigSchema.partial().optional(),
  tiers: z
    .object({ premium: TierChainSchema, standard: TierChainSchema, local: TierChainSchema })
    .partial()
    .optional(),
  providers: z.record(z.string().min(1), ProviderConfigSchema).optional(),
  persistence: z
    .object({ enabled: z.boolean(), databasePath: z.string().min(1) })
    .partial()
    .optional(),
  transport: z
    .object({ socketPath: z.string().min(1), secret: z.string().min(1) })
    .partial()
    .optional(),
  maxWorkflowHistory: z.number().int().min(0).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ── Merging ─────────────────────────────────────────────────────────────

export function mergeConfig(base: ICoordinatorConfig, layer: ConfigFile | undefined): ICoordinatorConfig {
  if (!layer) {
    return base;
  }
  return {
    budget: { ...base.budget, ...layer.budget },
    circuitBreaker: { ...base.circuitBreaker, ...layer.circuitBreaker },
    retry: { ...base.retry, ...layer.retry },
    timeouts: { ...base.timeouts, ...layer.timeouts },
    heartbeat: { ...base.heartbeat, ...layer.heartbeat },
    tiers: { ...base.tiers, ...layer.tiers },
    providers: { ...base.providers, ...layer.providers },
    persistence: { ...base.persistence, ...layer.persistence },
    transport: { ...base.transport, ...layer.transport },
    maxWorkflowHistory: layer.maxWorkflowHistory ?? base.maxWorkflowHistory,
  };
}

/** Cross-field checks a single section schema cannot express. */
export function checkConfig(config: ICoordinatorConfig): string[] {
  const issues: string[] = [];
  if (config.budget.premiumBelow > config.budget.localAbove) {
    issues.push("budget.premiumBelow must not exceed budget.localAbove");
  }
  if (config.circuitBreaker.maxCooldownMs < config.circuitBreaker.cooldownMs) {
    issues.push("circuitBreaker.maxCooldownMs must be at least circuitBreaker.cooldownMs");
  }
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    issues.push("retry.maxDelayMs must be at least retry.baseDelayMs");
  }
  if (config.heartbeat.timeoutMs <= config.heartbeat.intervalMs) {
    issues.push("heartbeat.timeoutMs must be greater than heartbeat.intervalMs");
  }
  return issues;
}

// ── ConfigStore ─────────────────────────────────────────────────────────

export class ConfigStore {
  private globalLayer: ConfigFile | undefined;
  private projectLayer: ConfigFile | undefined;
  private mergedConfig: ICoordinatorConfig = DEFAULT_CONFIG;

  get config(): ICoordinatorConfig {
    return this.mergedConfig;
  }

  loadGlobal(configPath?: string): ICoordinatorConfig {
    const resolvedPath = configPath ?? getConfigPath();
    this.globalLayer = this.readLayer(resolvedPath, "Global");
    this.rebuildMergedConfig();
    return this.mergedConfig;
  }

  loadProject(projectRoot: string): ICoordinatorConfig {
    const resolvedPath = getProjectConfigPath(projectRoot);
    this.projectLayer = this.readLayer(resolvedPath, "Project");
    this.rebuildMergedConfig();
    return this.mergedConfig;
  }

  /** Write a layer to the global config file (mode 600) and apply it. */
  saveGlobal(layer: ConfigFile, configPath?: string): void {
    const validated = ConfigFileSchema.parse(layer);
    const resolvedPath = configPath ?? getConfigPath();

    ensureSecureDirectory(dirname(resolvedPath));
    writeFileSync(resolvedPath, JSON.stringify(validated, null, 2), { encoding: "utf-8", mode: 0o600 });
    logger.info({ path: resolvedPath }, "Global config saved");

    this.globalLayer = validated;
    this.rebuildMergedConfig();
  }

  private readLayer(filePath: string, label: string): ConfigFile | undefined {
    if (!existsSync(filePath)) {
      logger.debug({ path: filePath }, `${label} config not found`);
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, "utf-8"));
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ path: filePath, error: reason }, `${label} config is not valid JSON, ignoring`);
      return undefined;
    }

    const validated = ConfigFileSchema.safeParse(parsed);
    if (!validated.success) {
      logger.warn({ path: filePath, errors: validated.error.issues }, `${label} config validation failed, ignoring`);
      return undefined;
    }

    const issues = checkConfig(mergeConfig(DEFAULT_CONFIG, validated.data));
    if (issues.length > 0) {
      logger.warn({ path: filePath, errors: issues }, `${label} config is inconsistent, ignoring`);
      return undefined;
    }

    logger.info({ path: filePath }, `${label} config loaded`);
    return validated.data;
  }

  private rebuildMergedConfig(): void {
    const merged = mergeConfig(mergeConfig(DEFAULT_CONFIG, this.globalLayer), this.projectLayer);
    const issues = checkConfig(merged);
    if (issues.length > 0) {
      logger.warn({ errors: issues }, "Project config conflicts with global config, using global only");
      this.mergedConfig = mergeConfig(DEFAULT_CONFIG, this.globalLayer);
      return;
    }
    this.mergedConfig = merged;
  }
}
