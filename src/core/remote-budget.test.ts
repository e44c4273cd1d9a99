import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RemoteBudget } from "./remote-budget.js";
import { InMemoryMessageBus } from "../teams/message-bus.js";
import { ValidationError } from "../types/errors.js";
import type { IBudgetConfig } from "../types/config.js";

const CONFIG: IBudgetConfig = {
  limitUsd: 100,
  periodMs: 30 * 86_400_000,
  premiumBelow: 0.8,
  localAbove: 0.95,
};

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("RemoteBudget", () => {
  let bus: InMemoryMessageBus;
  let budget: RemoteBudget;

  beforeEach(() => {
    bus = new InMemoryMessageBus();
    budget = new RemoteBudget(bus, CONFIG, { agentId: "worker-1" });
  });

  afterEach(async () => {
    await budget.stop();
    bus.destroy();
  });

  it("forwards spend tagged with the agent and counts it locally", async () => {
    const spend = bus.subscribe("budget.spend");

    budget.recordSpend(12.5, { provider: "openai", model: "gpt-4o", taskId: "wf/t1" });

    expect((await spend.next()).value).toEqual({
      amount: 12.5,
      agentId: "worker-1",
      provider: "openai",
      model: "gpt-4o",
      taskId: "wf/t1",
    });
    expect(budget.knownConsumed).toBe(12.5);
  });

  it("rejects negative or non-finite spend without publishing", () => {
    const spend = bus.subscribe("budget.spend");

    expect(() => budget.recordSpend(-1)).toThrow(ValidationError);
    expect(() => budget.recordSpend(Number.NaN)).toThrow(ValidationError);
    expect(spend.backlog).toBe(0);
    expect(budget.knownConsumed).toBe(0);
  });

  it("routes on local spend before any update arrives", () => {
    budget.recordSpend(79);
    expect(budget.tierFor()).toBe("premium");
    expect(budget.tierFor(2)).toBe("standard");

    budget.recordSpend(17);
    expect(budget.tierFor()).toBe("local");
  });

  it("follows the tier and spend reported by the coordinator", async () => {
    budget.start();

    bus.publish("budget.updated", { windowStart: 0, limit: 100, consumed: 96, tier: "local" });
    await flush();

    expect(budget.knownConsumed).toBe(96);
    expect(budget.tierFor()).toBe("local");
  });

  it("never lowers spend within a window", () => {
    budget.recordSpend(30);
    budget.apply({ windowStart: 0, limit: 100, consumed: 20, tier: "premium" });

    expect(budget.knownConsumed).toBe(30);
  });

  it("ignores stale windows and resets on rollover", () => {
    budget.apply({ windowStart: 1_000, limit: 100, consumed: 90, tier: "standard" });
    budget.apply({ windowStart: 0, limit: 100, consumed: 99, tier: "local" });
    expect(budget.knownConsumed).toBe(90);
    expect(budget.tierFor()).toBe("standard");

    budget.apply({ windowStart: 2_000, limit: 100, consumed: 0, tier: "premium" });
    expect(budget.knownConsumed).toBe(0);
    expect(budget.tierFor()).toBe("premium");
  });

  it("adopts the coordinator's limit", () => {
    budget.recordSpend(10);
    budget.apply({ windowStart: 0, limit: 12, consumed: 10, tier: "premium" });

    expect(budget.tierFor()).toBe("standard");
  });
});
