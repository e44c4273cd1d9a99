/**
 * Budget types
 */

/** Class of permissible backends, most to least expensive. */
export type BudgetTier = "premium" | "standard" | "local";

export const TIER_ORDER: readonly BudgetTier[] = ["premium", "standard", "local"] as const;

export interface ISpendSource {
  readonly provider?: string | undefined;
  readonly model?: string | undefined;
  readonly taskId?: string | undefined;
}

export interface IBudgetSnapshot {
  readonly windowStart: Date;
  readonly windowEnd: Date;
  readonly limit: number;
  readonly consumed: number;
  readonly ratio: number;
  readonly tier: BudgetTier;
}

export interface ISpendBreakdown {
  readonly byProvider: Readonly<Record<string, number>>;
  readonly byModel: Readonly<Record<string, number>>;
}

/**
 * What routing needs from a budget: a tier for a planned spend, and a place
 * to record the actual spend. BudgetController owns the window; agent
 * processes reach it over the bus.
 */
export interface IBudgetLedger {
  tierFor(estimatedCost?: number): BudgetTier;
  recordSpend(amount: number, source?: ISpendSource): void;
}
