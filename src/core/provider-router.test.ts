import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ProviderRouter, applyPreference, renderPrompt } from "./provider-router.js";
import { BudgetController } from "./budget-controller.js";
import { InMemoryMessageBus } from "../teams/message-bus.js";
import { ProviderRegistry } from "../providers/registry.js";
import type { IProviderClient } from "../providers/types.js";
import type { IGenerateParams, IGenerateResult } from "../types/provider.js";
import { ProviderExhaustedError } from "../types/errors.js";

class FakeClient implements IProviderClient {
  readonly kind = "openai" as const;
  readonly model: string;
  readonly prompts: string[] = [];
  failing = false;
  hang = false;
  cost = 0.01;

  constructor(readonly id: string) {
    this.model = `${id}-model`;
  }

  generate(prompt: string, params?: IGenerateParams): Promise<IGenerateResult> {
    this.prompts.push(prompt);
    if (this.hang) {
      return new Promise((_resolve, reject) => {
        params?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    }
    if (this.failing) {
      return Promise.reject(new Error(`${this.id} unavailable`));
    }
    return Promise.resolve({
      text: `${this.id}: ${prompt}`,
      model: this.model,
      costUsd: this.cost,
      inputTokens: 10,
      outputTokens: 20,
    });
  }

  estimateCost(): number {
    return 0.5;
  }
}

const TASK = { id: "wf/t1", type: "developer", description: "implement the parser" };

describe("ProviderRouter", () => {
  let bus: InMemoryMessageBus;
  let clock: number;
  let budget: BudgetController;
  let registry: ProviderRegistry;
  let a: FakeClient;
  let b: FakeClient;
  let local: FakeClient;
  let router: ProviderRouter;

  beforeEach(() => {
    bus = new InMemoryMessageBus();
    clock = 0;
    budget = new BudgetController(
      bus,
      { limitUsd: 10, periodMs: 1_000_000, premiumBelow: 0.8, localAbove: 0.95 },
      { now: () => clock },
    );
    registry = new ProviderRegistry();
    a = new FakeClient("a");
    b = new FakeClient("b");
    local = new FakeClient("local");
    for (const client of [a, b, local]) registry.register(client);

    router = new ProviderRouter(registry, budget, {
      tiers: { premium: ["a", "b"], standard: ["b"], local: ["local"] },
      circuitBreaker: { failureThreshold: 3, cooldownMs: 30_000, maxCooldownMs: 120_000 },
      callTimeoutMs: 50,
      now: () => clock,
    });
  });

  afterEach(() => {
    bus.destroy();
  });

  it("uses the first provider in the chain and records its cost", async () => {
    const result = await router.execute(TASK, "premium");

    expect(result).toMatchObject({ provider: "a", model: "a-model", tier: "premium", costUsd: 0.01, attempts: [] });
    expect(result.text).toBe("a: implement the parser");
    expect(budget.getBreakdown().byProvider).toEqual({ a: 0.01 });
  });

  it("falls back down the chain when a provider fails", async () => {
    a.failing = true;
    const result = await router.execute(TASK, "premium");

    expect(result.provider).toBe("b");
    expect(result.attempts).toEqual([
      { provider: "a", outcome: "failed", error: "a unavailable", latencyMs: 0 },
    ]);
  });

  it("opens the breaker after three failures, routes around it, then sends one trial", async () => {
    a.failing = true;
    for (let i = 0; i < 3; i++) {
      expect((await router.execute(TASK, "premium")).provider).toBe("b");
    }
    expect(a.prompts).toHaveLength(3);
    expect(router.getHealth().find((h) => h.provider === "a")?.circuitState).toBe("open");

    clock = 29_999;
    const during = await router.execute(TASK, "premium");
    expect(during.provider).toBe("b");
    expect(during.attempts).toEqual([{ provider: "a", outcome: "circuit_open", latencyMs: 0 }]);
    expect(a.prompts).toHaveLength(3);

    clock = 30_000;
    a.failing = false;
    const after = await router.execute(TASK, "premium");
    expect(after.provider).toBe("a");
    expect(a.prompts).toHaveLength(4);
    expect(router.getHealth().find((h) => h.provider === "a")?.circuitState).toBe("closed");
  });

  it("throws ProviderExhaustedError listing every attempt", async () => {
    a.failing = true;
    b.failing = true;

    const error = await router.execute(TASK, "premium").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderExhaustedError);
    if (error instanceof ProviderExhaustedError) {
      expect(error.attempts.map((attempt) => `${attempt.provider}:${attempt.outcome}`)).toEqual([
        "a:failed",
        "b:failed",
      ]);
      expect(error.message).toBe("All providers in the premium tier failed: a(failed), b(failed)");
    }
  });

  it("reports unknown chain members as not configured", async () => {
    const sparse = new ProviderRouter(registry, budget, {
      tiers: { premium: ["missing", "b"], standard: [], local: [] },
      circuitBreaker: { failureThreshold: 3, cooldownMs: 30_000, maxCooldownMs: 120_000 },
      callTimeoutMs: 50,
    });

    const result = await sparse.execute(TASK, "premium");
    expect(result.attempts).toEqual([{ provider: "missing", outcome: "not_configured", latencyMs: 0 }]);
    await expect(sparse.execute(TASK, "local")).rejects.toThrow("empty chain");
  });

  it("counts a call timeout as a provider failure", async () => {
    a.hang = true;
    const result = await router.execute(TASK, "premium");

    expect(result.provider).toBe("b");
    expect(result.attempts[0]).toMatchObject({ provider: "a", outcome: "failed", error: "Provider a timed out after 50ms" });
    expect(router.getHealth().find((h) => h.provider === "a")?.consecutiveFailures).toBe(1);
  });

  it("moves the agent's preferred providers to the front of the chain", async () => {
    const result = await router.execute(TASK, "premium", { preference: ["b", "local"] });
    expect(result.provider).toBe("b");
    expect(router.chainFor("premium", ["b", "local"])).toEqual(["b", "a"]);
  });

  describe("route", () => {
    it("derives the tier from the budget", async () => {
      expect((await router.route(TASK)).tier).toBe("premium");

      budget.recordSpend(8.5);
      const standard = await router.route(TASK);
      expect(standard).toMatchObject({ tier: "standard", provider: "b" });
    });

    it("downgrades to local instead of failing when the budget is nearly spent", async () => {
      budget.recordSpend(9.6);
      const result = await router.route(TASK, { estimatedCost: 0 });
      expect(result).toMatchObject({ tier: "local", provider: "local" });
    });

    it("includes the estimated cost in the tier decision", async () => {
      budget.recordSpend(7.6);
      expect((await router.route(TASK, { estimatedCost: 0.1 })).tier).toBe("premium");
      expect((await router.route(TASK)).tier).toBe("standard");
    });
  });
});

describe("applyPreference", () => {
  it("keeps chain order for non-preferred members and ignores outsiders", () => {
    expect(applyPreference(["a", "b", "c"], ["c", "x", "c", "a"])).toEqual(["c", "a", "b"]);
    expect(applyPreference(["a", "b"], undefined)).toEqual(["a", "b"]);
  });
});

describe("renderPrompt", () => {
  it("prefers params.prompt, then description with context", () => {
    expect(renderPrompt({ ...TASK, params: { prompt: "explicit" } }).prompt).toBe("explicit");
    expect(renderPrompt({ ...TASK, params: { context: "uses yaml" } }).prompt).toBe(
      "implement the parser\n\nContext:\nuses yaml",
    );
    expect(renderPrompt(TASK)).toEqual({
      prompt: "implement the parser",
      system: "You are the developer agent of a software team.",
    });
  });

  it("appends results of earlier tasks", () => {
    const { prompt } = renderPrompt({ ...TASK, inputs: { design: "use a pratt parser", spike: { ok: true } } });
    expect(prompt).toBe(
      "implement the parser\n\nResults from earlier tasks:\n\n### design\nuse a pratt parser\n\n### spike\n{\n  \"ok\": true\n}",
    );
  });
});
