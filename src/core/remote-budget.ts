/**
 * Budget view for an agent process behind a transport.
 *
 * Spend is forwarded to the coordinator as `budget.spend`; the coordinator's
 * BudgetController owns the window and answers with `budget.updated`.
 * Between updates, spend recorded here is counted locally so routing in this
 * process never sees a richer tier than it has paid for.
 */

import type { BudgetTier, IBudgetLedger, ISpendSource } from "../types/budget.js";
import { TIER_ORDER } from "../types/budget.js";
import type { IBudgetConfig } from "../types/config.js";
import { ValidationError } from "../types/errors.js";
import type { IBudgetUpdatedMessage } from "../types/message.js";
import type { IMessageBus, Subscription } from "../teams/message-bus.js";
import { logger } from "../utils/logger.js";
import { tierForRatio } from "./budget-controller.js";

export interface IRemoteBudgetOptions {
  /** Tags forwarded spend with the agent that incurred it. */
  readonly agentId?: string | undefined;
}

function poorer(a: BudgetTier, b: BudgetTier): BudgetTier {
  return TIER_ORDER.indexOf(a) >= TIER_ORDER.indexOf(b) ? a : b;
}

export class RemoteBudget implements IBudgetLedger {
  private readonly bus: IMessageBus;
  private readonly config: IBudgetConfig;
  private readonly agentId: string | undefined;

  private windowStart: number | undefined;
  private limit: number;
  private consumed = 0;
  private reportedTier: BudgetTier = "premium";
  private updates: Subscription<IBudgetUpdatedMessage> | undefined;
  private pump: Promise<void> | undefined;

  constructor(bus: IMessageBus, config: IBudgetConfig, options?: IRemoteBudgetOptions) {
    this.bus = bus;
    this.config = config;
    this.limit = config.limitUsd;
    this.agentId = options?.agentId;
  }

  /** Spend known to this process in the current window. */
  get knownConsumed(): number {
    return this.consumed;
  }

  start(): void {
    if (this.updates) return;
    const updates = this.bus.subscribe("budget.updated");
    this.updates = updates;
    this.pump = this.follow(updates);
  }

  async stop(): Promise<void> {
    this.updates?.close();
    this.updates = undefined;
    await this.pump;
    this.pump = undefined;
  }

  tierFor(estimatedCost = 0): BudgetTier {
    const cost = Number.isFinite(estimatedCost) && estimatedCost > 0 ? estimatedCost : 0;
    return poorer(tierForRatio((this.consumed + cost) / this.limit, this.config), this.reportedTier);
  }

  recordSpend(amount: number, source?: ISpendSource): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ValidationError("spend amount", [`expected a non-negative finite number, got ${String(amount)}`]);
    }
    this.consumed += amount;
    this.bus.publish("budget.spend", {
      amount,
      agentId: this.agentId,
      provider: source?.provider,
      model: source?.model,
      taskId: source?.taskId,
    });
  }

  /** Adopt the coordinator's window. Within a window `consumed` never shrinks. */
  apply(update: IBudgetUpdatedMessage): void {
    const rolled = this.windowStart !== undefined && update.windowStart > this.windowStart;
    if (this.windowStart !== undefined && update.windowStart < this.windowStart) return;

    this.windowStart = update.windowStart;
    this.limit = update.limit;
    this.consumed = rolled ? update.consumed : Math.max(this.consumed, update.consumed);
    this.reportedTier = update.tier;
    logger.debug({ consumed: this.consumed, tier: update.tier }, "Budget update received");
  }

  private async follow(updates: Subscription<IBudgetUpdatedMessage>): Promise<void> {
    for await (const update of updates) {
      this.apply(update);
    }
  }
}
