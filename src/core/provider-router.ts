/**
 * Tier-based provider selection with per-provider circuit breakers.
 * Resolution pipeline: budget tier → tier chain → agent preference reorder → first healthy provider
 */

import type { BudgetTier, IBudgetLedger } from "../types/budget.js";
import type { ICircuitBreakerConfig } from "../types/config.js";
import type { IProviderHealth } from "../types/provider.js";
import type { IProviderAttempt } from "../types/errors.js";
import { ProviderExhaustedError, TaskTimeoutError } from "../types/errors.js";
import { CircuitBreaker } from "../providers/circuit-breaker.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { logger, withTimeout } from "../utils/index.js";

// ── Public Types ──────────────────────────────────────────────────────

export interface IProviderRouterOptions {
  readonly tiers: Readonly<Record<BudgetTier, readonly string[]>>;
  readonly circuitBreaker: ICircuitBreakerConfig;
  readonly callTimeoutMs: number;
  readonly now?: (() => number) | undefined;
}

/** The parts of a task the router needs to build a prompt. */
export interface IRoutableTask {
  readonly id: string;
  readonly type: string;
  readonly description: string;
  readonly params?: Readonly<Record<string, unknown>> | undefined;
  readonly inputs?: Readonly<Record<string, unknown>> | undefined;
}

export interface IExecuteOptions {
  /** Provider ids to move to the front of the chain, in order. */
  readonly preference?: readonly string[] | undefined;
  readonly signal?: AbortSignal | undefined;
  readonly maxTokens?: number | undefined;
}

export interface IRouteOptions extends IExecuteOptions {
  readonly estimatedCost?: number | undefined;
}

export interface IRouteResult {
  readonly provider: string;
  readonly model: string;
  readonly tier: BudgetTier;
  readonly text: string;
  readonly costUsd: number;
  readonly attempts: readonly IProviderAttempt[];
}

// ── Helpers ───────────────────────────────────────────────────────────

/**
 * Build the prompt for a task: an explicit `params.prompt` wins,
 * otherwise the description with any `params.context` appended.
 * Results of earlier tasks follow, one section per dependency.
 */
export function renderPrompt(task: IRoutableTask): { prompt: string; system: string } {
  const params = task.params ?? {};
  const explicit = params["prompt"];
  const context = params["context"];
  const system = params["system"];

  let prompt = typeof explicit === "string"
    ? explicit
    : typeof context === "string" && context.length > 0
      ? `${task.description}\n\nContext:\n${context}`
      : task.description;

  const sections = Object.entries(task.inputs ?? {}).map(
    ([key, value]) => `### ${key}\n${typeof value === "string" ? value : JSON.stringify(value, null, 2)}`,
  );
  if (sections.length > 0) {
    prompt += `\n\nResults from earlier tasks:\n\n${sections.join("\n\n")}`;
  }

  return {
    prompt,
    system: typeof system === "string" ? system : `You are the ${task.type} agent of a software team.`,
  };
}

/** Move preferred members of `chain` to the front, keeping the rest in chain order. */
export function applyPreference(chain: readonly string[], preference: readonly string[] | undefined): string[] {
  if (!preference || preference.length === 0) {
    return [...chain];
  }
  const preferred = preference.filter((id, index) => chain.includes(id) && preference.indexOf(id) === index);
  return [...preferred, ...chain.filter((id) => !preferred.includes(id))];
}

// ── ProviderRouter ────────────────────────────────────────────────────

export class ProviderRouter {
  private readonly registry: ProviderRegistry;
  private readonly budget: IBudgetLedger;
  private readonly options: IProviderRouterOptions;
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly now: () => number;

  constructor(registry: ProviderRegistry, budget: IBudgetLedger, options: IProviderRouterOptions) {
    this.registry = registry;
    this.budget = budget;
    this.options = options;
    this.now = options.now ?? Date.now;

    for (const chain of Object.values(options.tiers)) {
      for (const id of chain) {
        this.breakerFor(id);
      }
    }
  }

  /**
   * Pick the tier from the budget, then execute. Crossing a budget
   * threshold downgrades the tier; it never fails the call.
   */
  async route(task: IRoutableTask, options?: IRouteOptions): Promise<IRouteResult> {
    const estimatedCost = options?.estimatedCost ?? this.estimateCost(task, options?.maxTokens);
    const tier = this.budget.tierFor(estimatedCost);
    logger.debug({ taskId: task.id, tier, estimatedCost }, "Routing task");
    return this.execute(task, tier, options);
  }

  /**
   * Try the tier's providers in order. Each call is gated by its breaker and a
   * timeout. Throws ProviderExhaustedError when nothing in the chain succeeds.
   */
  async execute(task: IRoutableTask, tier: BudgetTier, options?: IExecuteOptions): Promise<IRouteResult> {
    const chain = this.chainFor(tier, options?.preference);
    const { prompt, system } = renderPrompt(task);
    const attempts: IProviderAttempt[] = [];

    for (const providerId of chain) {
      throwIfAborted(options?.signal);

      const client = this.registry.get(providerId);
      if (!client) {
        attempts.push({ provider: providerId, outcome: "not_configured", latencyMs: 0 });
        continue;
      }

      const breaker = this.breakerFor(providerId);
      if (!breaker.tryAcquire()) {
        attempts.push({ provider: providerId, outcome: "circuit_open", latencyMs: 0 });
        continue;
      }

      const started = this.now();
      const controller = new AbortController();
      const unlink = linkAbort(options?.signal, controller);

      try {
        const result = await withTimeout(
          client.generate(prompt, {
            system,
            maxTokens: options?.maxTokens,
            signal: controller.signal,
          }),
          this.options.callTimeoutMs,
          `Provider ${providerId}`,
          () => controller.abort(),
        );

        breaker.recordSuccess();
        this.budget.recordSpend(result.costUsd, { provider: providerId, model: result.model, taskId: task.id });
        logger.info(
          { taskId: task.id, provider: providerId, tier, costUsd: result.costUsd, latencyMs: this.now() - started },
          "Provider call succeeded",
        );

        return {
          provider: providerId,
          model: result.model,
          tier,
          text: result.text,
          costUsd: result.costUsd,
          attempts,
        };
      } catch (error: unknown) {
        if (options?.signal?.aborted === true && !(error instanceof TaskTimeoutError)) {
          breaker.releaseTrial();
          throw error;
        }

        breaker.recordFailure();
        const reason = error instanceof Error ? error.message : String(error);
        attempts.push({ provider: providerId, outcome: "failed", error: reason, latencyMs: this.now() - started });
        logger.warn({ taskId: task.id, provider: providerId, tier, error: reason }, "Provider call failed, trying next");
      } finally {
        unlink();
      }
    }

    logger.error({ taskId: task.id, tier, attempts }, "Provider chain exhausted");
    throw new ProviderExhaustedError(tier, attempts);
  }

  /** The chain tried for a tier, with `preference` members first. */
  chainFor(tier: BudgetTier, preference?: readonly string[]): string[] {
    return applyPreference(this.options.tiers[tier], preference);
  }

  /**
   * Health of every provider that appears in a chain or has been called.
   */
  getHealth(): IProviderHealth[] {
    return [...this.breakers.values()].map((breaker) => breaker.getHealth());
  }

  private breakerFor(providerId: string): CircuitBreaker {
    let breaker = this.breakers.get(providerId);
    if (!breaker) {
      breaker = new CircuitBreaker(providerId, this.options.circuitBreaker, this.now);
      this.breakers.set(providerId, breaker);
    }
    return breaker;
  }

  private estimateCost(task: IRoutableTask, maxTokens: number | undefined): number {
    const { prompt } = renderPrompt(task);
    for (const providerId of this.options.tiers.premium) {
      const client = this.registry.get(providerId);
      if (client) {
        return client.estimateCost(prompt, maxTokens);
      }
    }
    return 0;
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted === true) {
    const error = new Error("Provider execution aborted");
    error.name = "AbortError";
    throw error;
  }
}

function linkAbort(signal: AbortSignal | undefined, controller: AbortController): () => void {
  if (!signal) {
    return () => {};
  }
  if (signal.aborted) {
    controller.abort();
    return () => {};
  }
  const onAbort = (): void => controller.abort();
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}
