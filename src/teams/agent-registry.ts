/**
 * Agent identity, capabilities and lifecycle.
 *
 * initializing → idle ⇄ busy; idle/busy → error on a reported fault;
 * error → idle on the next healthy heartbeat; any → offline on a missed
 * heartbeat window or deregistration. Offline is terminal for a registration.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type {
  AgentState,
  IAgentDescriptor,
  IAgentInfo,
  IAgentMetrics,
  IHeartbeatReport,
} from "../types/agent.js";
import type { IHeartbeatConfig } from "../types/config.js";
import {
  AgentNotFoundError,
  InvalidTransitionError,
  ValidationError,
} from "../types/errors.js";
import { logger } from "../utils/index.js";
import type { IMessageBus } from "./message-bus.js";

// ── Public Types ──────────────────────────────────────────────────────

export interface IAgentRegistryOptions {
  readonly heartbeat: IHeartbeatConfig;
  /** Clock in epoch milliseconds. */
  readonly now?: (() => number) | undefined;
}

export interface ITaskOutcome {
  readonly success: boolean;
  readonly durationMs: number;
}

// ── Internal Types ────────────────────────────────────────────────────

interface IAgentRecord {
  readonly id: string;
  readonly name: string;
  readonly role: string;
  readonly capabilities: ReadonlySet<string>;
  readonly modelPreference: readonly string[];
  readonly registeredAt: number;
  state: AgentState;
  currentTaskId: string | undefined;
  lastHeartbeat: number;
  lastAssignedAt: number | undefined;
  /** Value of the registry's assignment counter at the last assignment. */
  assignmentSeq: number;
  fault: string | undefined;
}

interface IMetricsRecord {
  tasksCompleted: number;
  tasksFailed: number;
  totalExecutionMs: number;
  lastActivity: number | undefined;
}

// ── Validation ────────────────────────────────────────────────────────

const AgentDescriptorSchema = z.object({
  id: z.string().trim().min(1).max(128).optional(),
  name: z.string().trim().min(1).max(128).optional(),
  role: z.string().trim().min(1, "role is required"),
  capabilities: z.array(z.string().trim().min(1, "capability tags must be non-empty")),
  modelPreference: z.array(z.string().min(1)).optional(),
});

const ALLOWED_TRANSITIONS: Readonly<Record<AgentState, readonly AgentState[]>> = {
  initializing: ["idle", "offline"],
  idle: ["busy", "error", "offline"],
  busy: ["idle", "error", "offline"],
  error: ["idle", "offline"],
  offline: [],
};

// ── AgentRegistry ─────────────────────────────────────────────────────

export class AgentRegistry {
  private readonly agents = new Map<string, IAgentRecord>();
  private readonly metrics = new Map<string, IMetricsRecord>();
  private readonly bus: IMessageBus;
  private readonly heartbeatConfig: IHeartbeatConfig;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private assignments = 0;

  constructor(bus: IMessageBus, options: IAgentRegistryOptions) {
    this.bus = bus;
    this.heartbeatConfig = options.heartbeat;
    this.now = options.now ?? Date.now;
  }

  /** Validate a descriptor and create a registration in `initializing`. */
  register(descriptor: IAgentDescriptor): string {
    const parsed = AgentDescriptorSchema.safeParse(descriptor);
    if (!parsed.success) {
      throw new ValidationError(
        "agent descriptor",
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "descriptor"}: ${issue.message}`),
      );
    }

    const data = parsed.data;
    const id = data.id ?? randomUUID();
    const existing = this.agents.get(id);
    if (existing && existing.state !== "offline") {
      throw new ValidationError("agent descriptor", [`id: agent "${id}" is already registered`]);
    }

    const now = this.now();
    const record: IAgentRecord = {
      id,
      name: data.name ?? `${data.role}-${id.slice(0, 8)}`,
      role: data.role,
      capabilities: new Set(data.capabilities),
      modelPreference: data.modelPreference ?? [],
      registeredAt: now,
      state: "initializing",
      currentTaskId: undefined,
      lastHeartbeat: now,
      lastAssignedAt: undefined,
      assignmentSeq: 0,
      fault: undefined,
    };
    this.agents.set(id, record);
    if (!this.metrics.has(id)) {
      this.metrics.set(id, { tasksCompleted: 0, tasksFailed: 0, totalExecutionMs: 0, lastActivity: undefined });
    }

    logger.info({ agentId: id, role: record.role, capabilities: data.capabilities }, "Agent registered");
    this.bus.publish("agent.status_changed", { agentId: id, newState: "initializing" });
    return id;
  }

  /**
   * Record liveness. Moves initializing → idle, and error → idle when healthy.
   * An unhealthy report from idle/busy is treated as a fault.
   */
  heartbeat(agentId: string, report?: IHeartbeatReport): void {
    const record = this.require(agentId);
    if (record.state === "offline") {
      throw new InvalidTransitionError(agentId, "offline", "idle");
    }

    record.lastHeartbeat = this.now();
    const healthy = report?.healthy ?? true;

    switch (record.state) {
      case "initializing":
        if (healthy) this.transition(record, "idle");
        break;
      case "error":
        if (healthy) {
          record.fault = undefined;
          this.transition(record, "idle");
        }
        break;
      case "idle":
      case "busy":
        if (!healthy) this.reportFault(agentId, "unhealthy heartbeat");
        break;
    }
  }

  /** idle/busy → error. A task held by the agent is released for reassignment. */
  reportFault(agentId: string, detail: string): void {
    const record = this.require(agentId);
    if (record.state === "error") {
      record.fault = detail;
      return;
    }
    this.assertTransition(record, "error");

    record.fault = detail;
    logger.warn({ agentId, detail }, "Agent reported fault");
    const released = this.clearTask(record);
    this.transition(record, "error");
    if (released) {
      this.bus.publish("agent.task_released", { agentId, taskId: released, reason: `agent fault: ${detail}` });
    }
  }

  /**
   * Compare-and-swap assignment: succeeds only for an idle agent while no
   * other agent holds the task. Sets busy and `currentTaskId` in one step.
   */
  tryAssign(agentId: string, taskId: string): boolean {
    const record = this.agents.get(agentId);
    if (!record || record.state !== "idle" || record.currentTaskId !== undefined) {
      return false;
    }
    if (this.holderOf(taskId) !== undefined) {
      return false;
    }

    record.currentTaskId = taskId;
    record.lastAssignedAt = this.now();
    this.assignments += 1;
    record.assignmentSeq = this.assignments;
    this.transition(record, "busy");
    logger.debug({ agentId, taskId }, "Agent assigned");
    return true;
  }

  /** busy → idle when the agent holds `taskId`. Returns whether anything was released. */
  release(agentId: string, taskId: string): boolean {
    const record = this.agents.get(agentId);
    if (!record || record.currentTaskId !== taskId) {
      return false;
    }

    record.currentTaskId = undefined;
    if (record.state === "busy") {
      this.transition(record, "idle");
    }
    return true;
  }

  /** any → offline. */
  deregister(agentId: string, reason = "deregistered"): void {
    const record = this.require(agentId);
    if (record.state === "offline") return;
    this.markOffline(record, reason);
  }

  /** Mark every agent whose heartbeat window elapsed as offline. Returns their ids. */
  sweep(now: number = this.now()): string[] {
    const expired: string[] = [];
    for (const record of this.agents.values()) {
      if (record.state === "offline") continue;
      if (now - record.lastHeartbeat > this.heartbeatConfig.timeoutMs) {
        expired.push(record.id);
      }
    }

    for (const agentId of expired) {
      const record = this.agents.get(agentId);
      if (record) {
        this.markOffline(record, "heartbeat timeout");
      }
    }
    return expired;
  }

  /**
   * Idle agents whose capabilities cover the requirement,
   * least-recently-assigned first. Agents never assigned come first, by id.
   */
  selectCandidates(requiredCapabilities: readonly string[]): IAgentInfo[] {
    const candidates: IAgentRecord[] = [];
    for (const record of this.agents.values()) {
      if (record.state !== "idle") continue;
      if (requiredCapabilities.every((capability) => record.capabilities.has(capability))) {
        candidates.push(record);
      }
    }

    candidates.sort((a, b) => {
      const byAssignment = a.assignmentSeq - b.assignmentSeq;
      if (byAssignment !== 0) return byAssignment;
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });
    return candidates.map((record) => this.toInfo(record));
  }

  recordOutcome(agentId: string, outcome: ITaskOutcome): void {
    const metrics = this.metrics.get(agentId);
    if (!metrics) return;

    if (outcome.success) {
      metrics.tasksCompleted += 1;
    } else {
      metrics.tasksFailed += 1;
    }
    metrics.totalExecutionMs += Math.max(0, outcome.durationMs);
    metrics.lastActivity = this.now();
  }

  getMetrics(agentId: string): IAgentMetrics | undefined {
    const metrics = this.metrics.get(agentId);
    if (!metrics) return undefined;

    const total = metrics.tasksCompleted + metrics.tasksFailed;
    return {
      agentId,
      tasksCompleted: metrics.tasksCompleted,
      tasksFailed: metrics.tasksFailed,
      totalExecutionMs: metrics.totalExecutionMs,
      averageExecutionMs: total > 0 ? metrics.totalExecutionMs / total : 0,
      successRate: total > 0 ? metrics.tasksCompleted / total : 0,
      lastActivity: metrics.lastActivity !== undefined ? new Date(metrics.lastActivity) : undefined,
    };
  }

  getAgent(agentId: string): IAgentInfo | undefined {
    const record = this.agents.get(agentId);
    return record ? this.toInfo(record) : undefined;
  }

  listAgents(): IAgentInfo[] {
    return [...this.agents.values()].map((record) => this.toInfo(record));
  }

  /** The agent currently holding `taskId`, if any. */
  holderOf(taskId: string): string | undefined {
    for (const record of this.agents.values()) {
      if (record.currentTaskId === taskId) return record.id;
    }
    return undefined;
  }

  /** Start the periodic heartbeat sweep. */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.heartbeatConfig.intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private require(agentId: string): IAgentRecord {
    const record = this.agents.get(agentId);
    if (!record) {
      throw new AgentNotFoundError(agentId);
    }
    return record;
  }

  private assertTransition(record: IAgentRecord, to: AgentState): void {
    if (!ALLOWED_TRANSITIONS[record.state].includes(to)) {
      throw new InvalidTransitionError(record.id, record.state, to);
    }
  }

  private transition(record: IAgentRecord, to: AgentState): void {
    this.assertTransition(record, to);
    const oldState = record.state;
    record.state = to;
    logger.debug({ agentId: record.id, oldState, newState: to }, "Agent state changed");
    this.bus.publish("agent.status_changed", { agentId: record.id, oldState, newState: to });
  }

  private clearTask(record: IAgentRecord): string | undefined {
    const taskId = record.currentTaskId;
    record.currentTaskId = undefined;
    return taskId;
  }

  private markOffline(record: IAgentRecord, reason: string): void {
    const released = this.clearTask(record);
    this.transition(record, "offline");
    logger.info({ agentId: record.id, reason, releasedTask: released }, "Agent offline");

    if (released) {
      this.bus.publish("agent.task_released", { agentId: record.id, taskId: released, reason });
    }
  }

  private toInfo(record: IAgentRecord): IAgentInfo {
    return {
      id: record.id,
      name: record.name,
      role: record.role,
      capabilities: [...record.capabilities],
      state: record.state,
      currentTaskId: record.currentTaskId,
      lastHeartbeat: new Date(record.lastHeartbeat),
      lastAssignedAt: record.lastAssignedAt !== undefined ? new Date(record.lastAssignedAt) : undefined,
      modelPreference: record.modelPreference,
      registeredAt: new Date(record.registeredAt),
      fault: record.fault,
    };
  }
}
