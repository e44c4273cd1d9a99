/**
 * Workflow DAG execution: assignment, retry, failure propagation, cancellation.
 *
 * The orchestrator is the only writer of task state. It reacts to agent
 * events from the bus one message at a time, and never waits on an agent.
 *
 *   pending → ready → assigned → running → succeeded
 *                ↑        │          │
 *                └────────┴──────────┴──→ pending (backoff) | failed
 *   pending | ready → skipped (failed dependency, cancellation)
 */

import { randomUUID } from "node:crypto";
import type { ErrorKind } from "../types/errors.js";
import {
  AgentUnavailableError,
  describeError,
  isTransientKind,
  TaskTimeoutError,
  WorkflowNotFoundError,
} from "../types/errors.js";
import type { IRetryConfig } from "../types/config.js";
import type {
  ITaskCompletedMessage,
  ITaskFailedMessage,
  ITaskStartedMessage,
  IAgentStatusChangedMessage,
  IAgentTaskReleasedMessage,
} from "../types/message.js";
import type {
  ITask,
  ITaskEnvelope,
  ITaskError,
  IWorkflow,
  IWorkflowSnapshot,
  TaskState,
  WorkflowState,
} from "../types/task.js";
import { isTerminalTaskState } from "../types/task.js";
import type { IPersistenceAdapter } from "../storage/types.js";
import type { AgentRegistry } from "../teams/agent-registry.js";
import type { IMessageBus, Subscription } from "../teams/message-bus.js";
import { backoffDelay, logger } from "../utils/index.js";
import { planWorkflow } from "./workflow-spec.js";

// ── Public Types ──────────────────────────────────────────────────────

export interface IWorkflowOrchestratorOptions {
  readonly retry: IRetryConfig;
  readonly taskTimeoutMs: number;
  /** Used when a spec does not set its own `timeoutMs`. */
  readonly workflowTimeoutMs: number;
  readonly maxWorkflowHistory: number;
  readonly persistence?: IPersistenceAdapter | undefined;
  readonly now?: (() => number) | undefined;
}

export interface IListWorkflowsOptions {
  /** true: only unfinished workflows; false: only finished ones. */
  readonly active?: boolean | undefined;
}

// ── Internal Types ────────────────────────────────────────────────────

interface IWorkflowRecord {
  readonly workflow: IWorkflow;
  /** Keyed by the task's local key. */
  readonly tasks: Map<string, ITask>;
  cancelled: boolean;
  timeoutTimer: ReturnType<typeof setTimeout> | undefined;
  waiters: Array<(snapshot: IWorkflowSnapshot) => void>;
}

// ── State Derivation ──────────────────────────────────────────────────

/**
 * Workflow state from its tasks. Succeeded tolerates non-critical
 * tasks that failed or were skipped; a critical failure makes a finished
 * workflow Failed and a running one PartiallyFailed.
 */
export function deriveWorkflowState(tasks: readonly Readonly<ITask>[], cancelled: boolean): WorkflowState {
  if (cancelled) return "cancelled";

  const criticalFailed = tasks.some((task) => task.critical && task.state === "failed");
  const finished = tasks.every((task) => isTerminalTaskState(task.state));
  if (!finished) {
    return criticalFailed ? "partially_failed" : "running";
  }

  const clean = tasks.every(
    (task) => task.state === "succeeded" || (!task.critical && (task.state === "failed" || task.state === "skipped")),
  );
  if (clean) return "succeeded";
  return criticalFailed ? "failed" : "partially_failed";
}

// ── WorkflowOrchestrator ──────────────────────────────────────────────

export class WorkflowOrchestrator {
  private readonly bus: IMessageBus;
  private readonly registry: AgentRegistry;
  private readonly options: IWorkflowOrchestratorOptions;
  private readonly now: () => number;

  private readonly workflows = new Map<string, IWorkflowRecord>();
  private readonly tasks = new Map<string, ITask>();
  /** Ready task ids in the order they became ready. */
  private readonly ready = new Set<string>();
  private readonly taskTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly retryTimers = new Map<string, ReturnType<typeof setTimeout>>();
  /** Finished workflow ids, oldest first. */
  private readonly history: string[] = [];

  private events: Subscription<() => void> | undefined;
  private pump: Promise<void> | undefined;

  constructor(bus: IMessageBus, registry: AgentRegistry, options: IWorkflowOrchestratorOptions) {
    this.bus = bus;
    this.registry = registry;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────

  /**
   * Begin consuming agent events from the bus. All topics arrive through one
   * stream and are handled strictly in publish order.
   */
  start(): void {
    if (this.events) return;

    const events = this.bus.subscribeMerged({
      "task.started": (message) => this.onTaskStarted(message),
      "task.completed": (message) => this.onTaskCompleted(message),
      "task.failed": (message) => this.onTaskFailed(message),
      "agent.task_released": (message) => this.onTaskReleased(message),
      "agent.status_changed": (message) => this.onAgentStatusChanged(message),
    });
    this.events = events;
    this.pump = this.drain(events);
    logger.info("Workflow orchestrator started");
  }

  /** Stop consuming events and clear every timer. Workflows stay queryable. */
  async stop(): Promise<void> {
    this.events?.close();
    await this.pump;
    this.events = undefined;
    this.pump = undefined;

    for (const timer of [...this.taskTimers.values(), ...this.retryTimers.values()]) {
      clearTimeout(timer);
    }
    this.taskTimers.clear();
    this.retryTimers.clear();
    for (const record of this.workflows.values()) {
      if (record.timeoutTimer) clearTimeout(record.timeoutTimer);
      record.timeoutTimer = undefined;
    }
  }

  // ── Inbound ─────────────────────────────────────────────────────────

  /**
   * Validate a WorkflowSpec, build its DAG and start scheduling.
   * Throws ValidationError before anything enters the DAG.
   */
  submitWorkflow(spec: unknown): string {
    const plan = planWorkflow(spec, { maxAttempts: this.options.retry.maxAttempts });
    const workflowId = randomUUID();
    const createdAt = new Date(this.now());

    const tasks = new Map<string, ITask>();
    for (const planned of plan.tasks) {
      const task: ITask = {
        id: `${workflowId}/${planned.key}`,
        key: planned.key,
        workflowId,
        type: planned.type,
        description: planned.description,
        requiredCapabilities: planned.requiredCapabilities,
        dependsOn: planned.dependsOn,
        critical: planned.critical,
        maxAttempts: planned.maxAttempts,
        params: planned.params,
        implicit: planned.implicit,
        state: "pending",
        attempt: 0,
        createdAt,
        updatedAt: createdAt,
      };
      tasks.set(planned.key, task);
      this.tasks.set(task.id, task);
    }

    const record: IWorkflowRecord = {
      workflow: {
        id: workflowId,
        name: plan.name,
        mode: plan.mode,
        taskIds: [...tasks.values()].map((task) => task.id),
        state: "running",
        createdAt,
      },
      tasks,
      cancelled: false,
      timeoutTimer: undefined,
      waiters: [],
    };
    this.workflows.set(workflowId, record);

    const timeoutMs = plan.timeoutMs ?? this.options.workflowTimeoutMs;
    record.timeoutTimer = setTimeout(() => {
      record.timeoutTimer = undefined;
      if (record.workflow.completedAt === undefined) {
        logger.warn({ workflowId, timeoutMs }, "Workflow timed out, cancelling");
        this.cancel(record, `workflow timed out after ${timeoutMs}ms`);
      }
    }, timeoutMs);
    record.timeoutTimer.unref();

    logger.info(
      { workflowId, name: plan.name, mode: plan.mode, tasks: plan.tasks.length },
      "Workflow submitted",
    );

    for (const task of tasks.values()) {
      if (task.dependsOn.length === 0) {
        this.markReady(task);
      }
    }
    this.schedule();
    return workflowId;
  }

  /**
   * Skip every unfinished task and tell agents holding one to abandon it.
   * Returns without waiting for the agents. No-op on a finished workflow.
   */
  cancelWorkflow(workflowId: string, reason = "workflow cancelled"): void {
    const record = this.requireWorkflow(workflowId);
    if (record.workflow.completedAt !== undefined) return;
    this.cancel(record, reason);
  }

  // ── Queries ─────────────────────────────────────────────────────────

  getWorkflow(workflowId: string): IWorkflowSnapshot | undefined {
    const record = this.workflows.get(workflowId);
    return record ? this.snapshotOf(record) : undefined;
  }

  listWorkflows(options?: IListWorkflowsOptions): IWorkflowSnapshot[] {
    const records = [...this.workflows.values()].filter((record) => {
      if (options?.active === undefined) return true;
      return options.active === (record.workflow.completedAt === undefined);
    });
    return records.map((record) => this.snapshotOf(record));
  }

  getTask(taskId: string): Readonly<ITask> | undefined {
    const task = this.tasks.get(taskId);
    return task ? { ...task } : undefined;
  }

  /**
   * Resolve with the final snapshot once the workflow finishes.
   * With `timeoutMs`, rejects with TaskTimeoutError instead of waiting longer.
   */
  waitForCompletion(workflowId: string, timeoutMs?: number): Promise<IWorkflowSnapshot> {
    const record = this.requireWorkflow(workflowId);
    if (record.workflow.completedAt !== undefined) {
      return Promise.resolve(this.snapshotOf(record));
    }

    return new Promise<IWorkflowSnapshot>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const waiter = (snapshot: IWorkflowSnapshot): void => {
        if (timer) clearTimeout(timer);
        resolve(snapshot);
      };
      record.waiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          record.waiters = record.waiters.filter((entry) => entry !== waiter);
          reject(new TaskTimeoutError(`Workflow ${workflowId}`, timeoutMs));
        }, timeoutMs);
      }
    });
  }

  /** Drop the oldest finished workflows beyond `max`. Returns how many were removed. */
  cleanupCompletedWorkflows(max: number = this.options.maxWorkflowHistory): number {
    let removed = 0;
    while (this.history.length > Math.max(0, max)) {
      const workflowId = this.history.shift();
      if (workflowId === undefined) break;
      const record = this.workflows.get(workflowId);
      if (!record) continue;

      for (const task of record.tasks.values()) {
        this.tasks.delete(task.id);
      }
      this.workflows.delete(workflowId);
      removed += 1;
    }
    if (removed > 0) {
      logger.debug({ removed }, "Archived workflows pruned");
    }
    return removed;
  }

  // ── Agent Events ────────────────────────────────────────────────────

  private onTaskStarted(message: ITaskStartedMessage): void {
    const task = this.currentAttempt(message);
    if (!task || task.state !== "assigned") return;
    this.setState(task, "running");
  }

  private onTaskCompleted(message: ITaskCompletedMessage): void {
    const task = this.currentAttempt(message);
    if (!task) return;

    this.clearTaskTimer(task.id);
    this.registry.release(message.agentId, task.id);
    this.registry.recordOutcome(message.agentId, { success: true, durationMs: message.durationMs });

    task.result = message.result;
    task.error = undefined;
    this.setState(task, "succeeded");
    this.persist(task);
    logger.info({ taskId: task.id, agentId: message.agentId, attempt: task.attempt }, "Task succeeded");

    this.settleDependents(task);
    this.schedule();
  }

  private onTaskFailed(message: ITaskFailedMessage): void {
    const task = this.currentAttempt(message);
    if (!task) return;

    this.clearTaskTimer(task.id);
    this.registry.release(message.agentId, task.id);
    this.registry.recordOutcome(message.agentId, { success: false, durationMs: message.durationMs });

    this.attemptFailed(task, message.error);
    this.schedule();
  }

  private onTaskReleased(message: IAgentTaskReleasedMessage): void {
    const task = this.tasks.get(message.taskId);
    if (!task || task.assignedAgent !== message.agentId) return;
    if (task.state !== "assigned" && task.state !== "running") return;

    this.clearTaskTimer(task.id);
    const error: ITaskError = describeError(new AgentUnavailableError(message.agentId, message.reason));
    logger.warn({ taskId: task.id, agentId: message.agentId, reason: message.reason }, "Task released by lost agent");
    this.bus.publish("task.abandon", {
      taskId: task.id,
      agentId: message.agentId,
      attempt: task.attempt,
      reason: error,
    });

    if (task.attempt >= task.maxAttempts) {
      this.fail(task, error);
    } else {
      task.error = error;
      this.markReady(task);
    }
    this.schedule();
  }

  private onAgentStatusChanged(message: IAgentStatusChangedMessage): void {
    if (message.newState === "idle" && this.ready.size > 0) {
      this.schedule();
    }
  }

  // ── Scheduling ──────────────────────────────────────────────────────

  /**
   * Offer every ready task to capable idle agents. A lost compare-and-swap
   * moves on to the next candidate; a task with no candidate stays ready.
   */
  private schedule(): void {
    for (const taskId of [...this.ready]) {
      const task = this.tasks.get(taskId);
      if (!task || task.state !== "ready") {
        this.ready.delete(taskId);
        continue;
      }

      const candidates = this.registry.selectCandidates(task.requiredCapabilities);
      const agent = candidates.find((candidate) => this.registry.tryAssign(candidate.id, task.id));
      if (agent) {
        this.assign(task, agent.id);
      } else {
        logger.debug(
          { taskId: task.id, requiredCapabilities: task.requiredCapabilities },
          "No capable idle agent, task waits",
        );
      }
    }
  }

  private assign(task: ITask, agentId: string): void {
    this.ready.delete(task.id);
    task.attempt += 1;
    task.assignedAgent = agentId;
    this.setState(task, "assigned");

    const attempt = task.attempt;
    const timer = setTimeout(() => {
      this.taskTimers.delete(task.id);
      this.onTaskTimeout(task, agentId, attempt);
    }, this.options.taskTimeoutMs);
    this.taskTimers.set(task.id, timer);

    const envelope: ITaskEnvelope = {
      taskId: task.id,
      workflowId: task.workflowId,
      attempt,
      type: task.type,
      description: task.description,
      requiredCapabilities: task.requiredCapabilities,
      params: task.params,
      inputs: this.inputsFor(task),
    };
    logger.info({ taskId: task.id, agentId, attempt }, "Task assigned");
    this.bus.enqueueTask(agentId, envelope);
  }

  private onTaskTimeout(task: ITask, agentId: string, attempt: number): void {
    if (task.attempt !== attempt || task.assignedAgent !== agentId) return;
    if (task.state !== "assigned" && task.state !== "running") return;

    const reason: ITaskError = {
      kind: "task_timeout",
      detail: new TaskTimeoutError(`Task ${task.id}`, this.options.taskTimeoutMs).message,
    };
    this.bus.publish("task.abandon", { taskId: task.id, agentId, attempt, reason });
    this.registry.release(agentId, task.id);
    this.registry.recordOutcome(agentId, { success: false, durationMs: this.options.taskTimeoutMs });

    this.attemptFailed(task, reason);
    this.schedule();
  }

  // ── Transitions ─────────────────────────────────────────────────────

  /** Retry transient failures with backoff until attempts run out. */
  private attemptFailed(task: ITask, error: ITaskError): void {
    if (!isTransientKind(error.kind) || task.attempt >= task.maxAttempts) {
      this.fail(task, error);
      return;
    }

    const delayMs = backoffDelay(task.attempt, this.options.retry);
    this.setState(task, "pending", error);
    logger.info(
      { taskId: task.id, attempt: task.attempt, maxAttempts: task.maxAttempts, delayMs, error: error.detail },
      "Task attempt failed, retrying after backoff",
    );

    const timer = setTimeout(() => {
      this.retryTimers.delete(task.id);
      if (task.state !== "pending") return;
      this.markReady(task);
      this.schedule();
    }, delayMs);
    this.retryTimers.set(task.id, timer);
  }

  private fail(task: ITask, error: ITaskError): void {
    this.setState(task, "failed", error);
    this.persist(task);
    logger.warn({ taskId: task.id, attempt: task.attempt, kind: error.kind, error: error.detail }, "Task failed");
    this.settleDependents(task);
  }

  private markReady(task: ITask): void {
    this.setState(task, "ready");
    if (task.implicit) {
      this.completeJoin(task);
      return;
    }
    this.ready.add(task.id);
  }

  /** Join tasks finish without an agent; their result maps dependency keys to results. */
  private completeJoin(task: ITask): void {
    task.result = this.inputsFor(task) ?? {};
    this.setState(task, "succeeded");
    this.settleDependents(task);
  }

  /** Results of the task's succeeded dependencies, or undefined when it has none. */
  private inputsFor(task: ITask): Record<string, unknown> | undefined {
    const record = this.workflows.get(task.workflowId);
    const inputs: Record<string, unknown> = {};
    let found = false;
    for (const key of task.dependsOn) {
      const dep = record?.tasks.get(key);
      if (dep?.state === "succeeded") {
        inputs[key] = dep.result;
        found = true;
      }
    }
    return found ? inputs : undefined;
  }

  /**
   * Re-evaluate the pending dependents of a task that just finished.
   * A failed or skipped dependency skips the dependent; join tasks wait for
   * every dependency and are skipped only when a critical one did not succeed.
   */
  private settleDependents(finished: ITask): void {
    const record = this.workflows.get(finished.workflowId);
    if (!record) return;

    for (const task of record.tasks.values()) {
      if (task.state !== "pending" || !task.dependsOn.includes(finished.key)) continue;
      if (this.retryTimers.has(task.id)) continue;

      const deps = task.dependsOn.map((key) => record.tasks.get(key)).filter((dep): dep is ITask => dep !== undefined);

      if (task.implicit) {
        if (!deps.every((dep) => isTerminalTaskState(dep.state))) continue;
        const blocked = deps.find((dep) => dep.critical && dep.state !== "succeeded");
        if (blocked) {
          this.skip(task, "dependency_failed", `dependency ${blocked.key} ${blocked.state}`);
        } else {
          this.markReady(task);
        }
        continue;
      }

      const blocked = deps.find((dep) => dep.state === "failed" || dep.state === "skipped");
      if (blocked) {
        this.skip(task, "dependency_failed", `dependency ${blocked.key} ${blocked.state}`);
      } else if (deps.every((dep) => dep.state === "succeeded")) {
        this.markReady(task);
      }
    }

    this.refreshWorkflow(record);
  }

  private skip(task: ITask, kind: ErrorKind, detail: string): void {
    this.ready.delete(task.id);
    this.setState(task, "skipped", { kind, detail });
    if (kind === "dependency_failed") {
      this.settleDependents(task);
    }
  }

  private cancel(record: IWorkflowRecord, reason: string): void {
    record.cancelled = true;
    const error: ITaskError = { kind: "cancelled", detail: reason };

    for (const task of record.tasks.values()) {
      if (isTerminalTaskState(task.state)) continue;

      this.clearTaskTimer(task.id);
      const retry = this.retryTimers.get(task.id);
      if (retry) {
        clearTimeout(retry);
        this.retryTimers.delete(task.id);
      }

      const agentId = task.assignedAgent;
      if ((task.state === "assigned" || task.state === "running") && agentId !== undefined) {
        this.bus.publish("task.abandon", { taskId: task.id, agentId, attempt: task.attempt, reason: error });
        this.registry.release(agentId, task.id);
      }
      this.skip(task, "cancelled", reason);
    }

    logger.info({ workflowId: record.workflow.id, reason }, "Workflow cancelled");
    this.refreshWorkflow(record);
    this.schedule();
  }

  private refreshWorkflow(record: IWorkflowRecord): void {
    const workflow = record.workflow;
    if (workflow.completedAt !== undefined) return;

    const tasks = [...record.tasks.values()];
    const next = deriveWorkflowState(tasks, record.cancelled);
    if (next !== workflow.state) {
      logger.info({ workflowId: workflow.id, oldState: workflow.state, newState: next }, "Workflow state changed");
      workflow.state = next;
    }

    if (!tasks.every((task) => isTerminalTaskState(task.state))) return;

    workflow.completedAt = new Date(this.now());
    if (record.timeoutTimer) {
      clearTimeout(record.timeoutTimer);
      record.timeoutTimer = undefined;
    }

    logger.info({ workflowId: workflow.id, finalState: workflow.state }, "Workflow completed");
    this.bus.publish("workflow.completed", { workflowId: workflow.id, finalState: workflow.state });

    const snapshot = this.snapshotOf(record);
    const waiters = record.waiters;
    record.waiters = [];
    for (const waiter of waiters) {
      waiter(snapshot);
    }

    const persistence = this.options.persistence;
    if (persistence) {
      persistence.saveWorkflow(snapshot).catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn({ workflowId: workflow.id, error: reason }, "Failed to persist workflow");
      });
    }

    this.history.push(workflow.id);
    this.cleanupCompletedWorkflows();
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private setState(task: ITask, next: TaskState, error?: ITaskError): void {
    const oldState = task.state;
    task.state = next;
    task.updatedAt = new Date(this.now());
    if (error) {
      task.error = error;
    }

    logger.debug({ taskId: task.id, oldState, newState: next, attempt: task.attempt }, "Task state changed");
    this.bus.publish("task.state_changed", {
      taskId: task.id,
      workflowId: task.workflowId,
      oldState,
      newState: next,
      attempt: task.attempt,
      error: next === "succeeded" ? undefined : task.error,
    });
  }

  /** The task an agent event refers to, if the event matches its live attempt. */
  private currentAttempt(message: { taskId: string; agentId: string; attempt: number }): ITask | undefined {
    const task = this.tasks.get(message.taskId);
    if (!task) return undefined;
    if (task.assignedAgent !== message.agentId || task.attempt !== message.attempt) {
      logger.debug({ ...message, currentAttempt: task.attempt }, "Ignoring stale task event");
      return undefined;
    }
    if (task.state !== "assigned" && task.state !== "running") {
      logger.debug({ ...message, state: task.state }, "Ignoring duplicate task event");
      return undefined;
    }
    return task;
  }

  private clearTaskTimer(taskId: string): void {
    const timer = this.taskTimers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.taskTimers.delete(taskId);
    }
  }

  private persist(task: ITask): void {
    const persistence = this.options.persistence;
    if (!persistence) return;

    persistence.saveTaskResult({ ...task }).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ taskId: task.id, error: reason }, "Failed to persist task result");
    });
  }

  private requireWorkflow(workflowId: string): IWorkflowRecord {
    const record = this.workflows.get(workflowId);
    if (!record) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return record;
  }

  private snapshotOf(record: IWorkflowRecord): IWorkflowSnapshot {
    const workflow = record.workflow;
    return {
      id: workflow.id,
      name: workflow.name,
      mode: workflow.mode,
      state: workflow.state,
      createdAt: workflow.createdAt,
      completedAt: workflow.completedAt,
      tasks: [...record.tasks.values()].map((task) => ({ ...task })),
    };
  }

  private async drain(events: Subscription<() => void>): Promise<void> {
    for await (const dispatch of events) {
      try {
        dispatch();
      } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error({ error: reason }, "Orchestrator event handler failed");
      }
    }
  }
}
