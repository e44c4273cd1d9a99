import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { AgentWorker, routeWith } from "./agent-worker.js";
import type { TaskExecutor } from "./agent-worker.js";
import { InMemoryMessageBus } from "./message-bus.js";
import { BudgetController } from "../core/budget-controller.js";
import { ProviderRouter } from "../core/provider-router.js";
import { ProviderRegistry } from "../providers/registry.js";
import type { IProviderClient } from "../providers/types.js";
import type { IGenerateResult } from "../types/provider.js";
import type { ITaskEnvelope } from "../types/task.js";

function envelope(taskId: string, attempt = 1): ITaskEnvelope {
  return {
    taskId,
    workflowId: "wf-1",
    attempt,
    type: "developer",
    description: `work on ${taskId}`,
    requiredCapabilities: [],
    params: {},
  };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("AgentWorker", () => {
  let bus: InMemoryMessageBus;
  let worker: AgentWorker | undefined;

  beforeEach(() => {
    bus = new InMemoryMessageBus();
  });

  afterEach(async () => {
    await worker?.stop();
    worker = undefined;
    bus.destroy();
  });

  function startWorker(executor: TaskExecutor): AgentWorker {
    worker = new AgentWorker(bus, {
      agentId: "dev-1",
      executor,
      heartbeatIntervalMs: 60_000,
      dequeueTimeoutMs: 10,
      now: () => 1_000,
    });
    worker.start();
    return worker;
  }

  it("sends a heartbeat as soon as it starts", async () => {
    const heartbeats = bus.subscribe("agent.heartbeat");
    startWorker(async () => "unused");

    expect((await heartbeats.next()).value).toEqual({ agentId: "dev-1", healthy: true });
  });

  it("runs queued envelopes and reports the result", async () => {
    const started = bus.subscribe("task.started");
    const completed = bus.subscribe("task.completed");
    startWorker(async (task) => `done ${task.taskId}`);

    bus.enqueueTask("dev-1", envelope("wf-1/a"));

    expect((await started.next()).value).toEqual({ taskId: "wf-1/a", agentId: "dev-1", attempt: 1 });
    expect((await completed.next()).value).toEqual({
      taskId: "wf-1/a",
      agentId: "dev-1",
      attempt: 1,
      result: "done wf-1/a",
      durationMs: 0,
    });
  });

  it("reports executor rejections with their error kind", async () => {
    const failed = bus.subscribe("task.failed");
    startWorker(async () => {
      throw new Error("compiler crashed");
    });

    bus.enqueueTask("dev-1", envelope("wf-1/a", 2));

    expect((await failed.next()).value).toEqual({
      taskId: "wf-1/a",
      agentId: "dev-1",
      attempt: 2,
      error: { kind: "execution_failed", detail: "compiler crashed" },
      durationMs: 0,
    });
  });

  it("aborts the executor on a matching abandon and reports nothing", async () => {
    const completed = bus.subscribe("task.completed");
    const failed = bus.subscribe("task.failed");
    const reasons: unknown[] = [];
    let settled = false;

    const current = startWorker(
      (_task, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => {
            reasons.push(signal.reason);
            settled = true;
            reject(new Error("stopped"));
          });
        }),
    );

    bus.enqueueTask("dev-1", envelope("wf-1/a", 1));
    await flush();
    expect(current.currentTask?.taskId).toBe("wf-1/a");

    bus.publish("task.abandon", {
      taskId: "wf-1/a",
      agentId: "dev-1",
      attempt: 2,
      reason: { kind: "cancelled", detail: "stale attempt" },
    });
    await flush();
    expect(settled).toBe(false);

    bus.publish("task.abandon", {
      taskId: "wf-1/a",
      agentId: "dev-1",
      attempt: 1,
      reason: { kind: "task_timeout", detail: "Task wf-1/a timed out" },
    });
    await flush();

    expect(settled).toBe(true);
    expect(reasons).toEqual([new Error("Task wf-1/a timed out")]);
    expect(current.currentTask).toBeUndefined();
    expect(completed.backlog).toBe(0);
    expect(failed.backlog).toBe(0);
  });

  it("answers status requests with what it is running", async () => {
    const started = bus.subscribe("task.started");
    startWorker(
      (_task, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener("abort", () => reject(new Error("stopped")));
        }),
    );

    const idle = await bus.request({ senderId: "lead", recipientId: "dev-1", kind: "status", payload: {} }, 1_000);
    expect(idle?.payload).toEqual({ agentId: "dev-1", busy: false });

    bus.enqueueTask("dev-1", envelope("wf-1/a", 2));
    await started.next();
    const busy = await bus.request({ senderId: "lead", recipientId: "dev-1", kind: "status", payload: {} }, 1_000);
    expect(busy?.payload).toEqual({ agentId: "dev-1", busy: true, taskId: "wf-1/a", attempt: 2 });
  });

  it("hands other kinds to its message handler and ignores mail for other agents", async () => {
    worker = new AgentWorker(bus, {
      agentId: "dev-1",
      executor: async () => "unused",
      heartbeatIntervalMs: 60_000,
      dequeueTimeoutMs: 10,
      onMessage: (message) => (message.kind === "estimate" ? { hours: 3, for: message.senderId } : undefined),
    });
    worker.start();

    const estimate = await bus.request({ senderId: "lead", recipientId: "dev-1", kind: "estimate", payload: {} }, 1_000);
    expect(estimate).toMatchObject({ senderId: "dev-1", recipientId: "lead", kind: "estimate", payload: { hours: 3, for: "lead" } });

    expect(await bus.request({ senderId: "lead", recipientId: "dev-1", kind: "unknown", payload: {} }, 20)).toBeUndefined();
    expect(await bus.request({ senderId: "lead", recipientId: "dev-2", kind: "estimate", payload: {} }, 20)).toBeUndefined();
  });

  it("stops pulling after stop()", async () => {
    const current = startWorker(async () => "done");
    await current.stop();

    bus.enqueueTask("dev-1", envelope("wf-1/a"));
    expect(current.isRunning).toBe(false);
    expect(bus.getQueueSize("dev-1")).toBe(1);
  });
});

describe("routeWith", () => {
  class EchoClient implements IProviderClient {
    readonly kind = "ollama" as const;
    readonly model = "echo";

    constructor(readonly id: string) {}

    generate(prompt: string): Promise<IGenerateResult> {
      return Promise.resolve({ text: `${this.id} <- ${prompt}`, model: this.model, costUsd: 0, inputTokens: 1, outputTokens: 1 });
    }

    estimateCost(): number {
      return 0;
    }
  }

  it("routes the envelope with its inputs and the agent's preference", async () => {
    const bus = new InMemoryMessageBus();
    const registry = new ProviderRegistry();
    registry.register(new EchoClient("first"));
    registry.register(new EchoClient("second"));
    const budget = new BudgetController(bus, { limitUsd: 10, periodMs: 60_000, premiumBelow: 0.8, localAbove: 0.95 });
    const router = new ProviderRouter(registry, budget, {
      tiers: { premium: ["first", "second"], standard: ["second"], local: ["second"] },
      circuitBreaker: { failureThreshold: 3, cooldownMs: 1_000, maxCooldownMs: 4_000 },
      callTimeoutMs: 1_000,
    });

    const execute = routeWith(router, ["second"]);
    const result = await execute(
      { ...envelope("wf-1/b"), inputs: { a: "parser written" } },
      new AbortController().signal,
    );

    expect(result).toBe("second <- work on wf-1/b\n\nResults from earlier tasks:\n\n### a\nparser written");
    bus.destroy();
  });
});
