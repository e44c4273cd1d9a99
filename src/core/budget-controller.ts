/**
 * Rolling-window spend tracking and cost-tier derivation.
 * - `consumed` only grows within a window and resets at rollover
 * - Tier thresholds are ratios of `limit`
 * - Tier changes are published on the bus, and every change to `consumed`
 *   as `budget.updated` so agent processes can follow the window
 */

import type {
  BudgetTier,
  IBudgetLedger,
  IBudgetSnapshot,
  ISpendBreakdown,
  ISpendSource,
} from "../types/budget.js";
import type { IBudgetConfig } from "../types/config.js";
import { InvalidConfigError, ValidationError } from "../types/errors.js";
import type { IMessageBus } from "../teams/message-bus.js";
import { formatCost, logger } from "../utils/index.js";

export interface IBudgetControllerOptions {
  readonly now?: (() => number) | undefined;
  /** Start of the first window; defaults to the current time. */
  readonly windowStart?: number | undefined;
}

interface ISpendEntry {
  readonly amount: number;
  readonly provider?: string | undefined;
  readonly model?: string | undefined;
}

/** Tier for a spend ratio under the configured thresholds. */
export function tierForRatio(ratio: number, config: IBudgetConfig): BudgetTier {
  if (ratio < config.premiumBelow) return "premium";
  if (ratio <= config.localAbove) return "standard";
  return "local";
}

export class BudgetController implements IBudgetLedger {
  private readonly config: IBudgetConfig;
  private readonly bus: IMessageBus;
  private readonly now: () => number;
  private windowStart: number;
  private consumed = 0;
  private entries: ISpendEntry[] = [];
  private currentTier: BudgetTier;

  constructor(bus: IMessageBus, config: IBudgetConfig, options?: IBudgetControllerOptions) {
    validateBudgetConfig(config);
    this.bus = bus;
    this.config = config;
    this.now = options?.now ?? Date.now;
    this.windowStart = options?.windowStart ?? this.now();
    this.currentTier = tierForRatio(0, config);
  }

  /**
   * Tier permitted for a call of the given estimated cost.
   * A spend that would cross a threshold is routed to the cheaper tier.
   */
  tierFor(estimatedCost = 0): BudgetTier {
    this.rollIfDue();
    const cost = Number.isFinite(estimatedCost) && estimatedCost > 0 ? estimatedCost : 0;
    return tierForRatio((this.consumed + cost) / this.config.limitUsd, this.config);
  }

  /** Add spend to the current window. Rejects negative or non-finite amounts. */
  recordSpend(amount: number, source?: ISpendSource): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError("spend amount", [`expected a non-negative finite number, got ${String(amount)}`]);
    }

    this.rollIfDue();
    this.consumed += amount;
    this.entries.push({ amount, provider: source?.provider, model: source?.model });

    logger.debug(
      { amount: formatCost(amount), consumed: formatCost(this.consumed), provider: source?.provider, taskId: source?.taskId },
      "Spend recorded",
    );
    this.publishTierIfChanged();
    this.broadcast();
  }

  /** Publish the current window as `budget.updated`. */
  broadcast(): void {
    const snap = this.snapshot();
    this.bus.publish("budget.updated", {
      windowStart: snap.windowStart.getTime(),
      limit: snap.limit,
      consumed: snap.consumed,
      tier: snap.tier,
    });
  }

  snapshot(): IBudgetSnapshot {
    this.rollIfDue();
    const ratio = this.consumed / this.config.limitUsd;
    return {
      windowStart: new Date(this.windowStart),
      windowEnd: new Date(this.windowStart + this.config.periodMs),
      limit: this.config.limitUsd,
      consumed: this.consumed,
      ratio,
      tier: tierForRatio(ratio, this.config),
    };
  }

  /**
   * Get spend in the current window by provider and model.
   */
  getBreakdown(): ISpendBreakdown {
    this.rollIfDue();
    const byProvider: Record<string, number> = {};
    const byModel: Record<string, number> = {};

    for (const entry of this.entries) {
      if (entry.provider) {
        byProvider[entry.provider] = (byProvider[entry.provider] ?? 0) + entry.amount;
      }
      if (entry.model) {
        byModel[entry.model] = (byModel[entry.model] ?? 0) + entry.amount;
      }
    }

    return { byProvider, byModel };
  }

  /**
   * Get formatted window summary.
   */
  getSummary(): string {
    const snap = this.snapshot();
    return `${formatCost(snap.consumed)} of ${formatCost(snap.limit)} (${(snap.ratio * 100).toFixed(1)}%, ${snap.tier})`;
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private rollIfDue(): void {
    const now = this.now();
    if (now < this.windowStart + this.config.periodMs) return;

    const elapsedWindows = Math.floor((now - this.windowStart) / this.config.periodMs);
    this.windowStart += elapsedWindows * this.config.periodMs;
    logger.info(
      { spent: formatCost(this.consumed), windowStart: new Date(this.windowStart).toISOString() },
      "Budget window rolled over",
    );
    this.consumed = 0;
    this.entries = [];
    this.publishTierIfChanged();
    this.broadcast();
  }

  private publishTierIfChanged(): void {
    const ratio = this.consumed / this.config.limitUsd;
    const tier = tierForRatio(ratio, this.config);
    if (tier === this.currentTier) return;

    const oldTier = this.currentTier;
    this.currentTier = tier;
    logger.warn({ oldTier, newTier: tier, ratio }, "Budget tier changed");
    this.bus.publish("budget.tier_changed", { oldTier, newTier: tier, ratio });
  }
}

function validateBudgetConfig(config: IBudgetConfig): void {
  if (!(config.limitUsd > 0)) {
    throw new InvalidConfigError("budget.limitUsd", "must be greater than zero");
  }
  if (!(config.periodMs > 0)) {
    throw new InvalidConfigError("budget.periodMs", "must be greater than zero");
  }
  if (!(config.premiumBelow > 0 && config.premiumBelow <= config.localAbove)) {
    throw new InvalidConfigError("budget.premiumBelow", "must be positive and not above budget.localAbove");
  }
}
