import { describe, it, expect, afterEach } from "vitest";
import { formatTaskResults } from "./results.js";
import { SqlitePersistence } from "../../storage/sqlite-persistence.js";
import type { ITask } from "../../types/task.js";

function task(overrides: Partial<ITask>): ITask {
  return {
    id: "wf-1/build",
    key: "build",
    workflowId: "wf-1",
    type: "developer",
    description: "build it",
    requiredCapabilities: ["code"],
    dependsOn: [],
    critical: true,
    maxAttempts: 3,
    params: {},
    implicit: false,
    state: "succeeded",
    attempt: 1,
    createdAt: new Date("2026-01-01T00:00:00.000Z"),
    updatedAt: new Date("2026-01-01T00:05:00.000Z"),
    ...overrides,
  };
}

describe("formatTaskResults", () => {
  const store = new SqlitePersistence();

  afterEach(() => {
    store.close();
  });

  it("prints what a run wrote through to the database", async () => {
    store.open(":memory:");
    await store.saveTaskResult(task({ assignedAgent: "dev-1", result: "parser written\nwith tests" }));
    await store.saveTaskResult(
      task({
        id: "wf-1/review",
        key: "review",
        type: "reviewer",
        state: "failed",
        attempt: 2,
        error: { kind: "agent_unavailable", detail: "agent rev-1 lost: heartbeat timeout" },
      }),
    );
    await store.saveTaskResult(task({ id: "wf-1/ship", key: "ship", state: "skipped" }));

    expect(formatTaskResults(store.listTaskResults("wf-1"))).toEqual([
      "build succeeded attempt 1 dev-1",
      "    parser written with tests",
      "review failed attempt 2 -",
      "    agent_unavailable: agent rev-1 lost: heartbeat timeout",
      "ship skipped attempt 1 -",
    ]);
  });
});
