/**
 * Bus topics and their payloads
 */

import type { AgentState } from "./agent.js";
import type { BudgetTier } from "./budget.js";
import type { ITaskError, TaskState, WorkflowState } from "./task.js";

// ── Agent → Coordinator ──────────────────────────────────────────────────

/** Registration request from an agent in another process. */
export interface IAgentAnnounceMessage {
  readonly agentId: string;
  readonly name?: string | undefined;
  readonly role: string;
  readonly capabilities: readonly string[];
  readonly modelPreference?: readonly string[] | undefined;
}

export interface IHeartbeatMessage {
  readonly agentId: string;
  readonly healthy: boolean;
}

export interface IAgentFaultMessage {
  readonly agentId: string;
  readonly detail: string;
}

export interface ITaskStartedMessage {
  readonly taskId: string;
  readonly agentId: string;
  readonly attempt: number;
}

export interface ITaskCompletedMessage {
  readonly taskId: string;
  readonly agentId: string;
  readonly attempt: number;
  readonly result?: unknown;
  readonly durationMs: number;
}

export interface ITaskFailedMessage {
  readonly taskId: string;
  readonly agentId: string;
  readonly attempt: number;
  readonly error: ITaskError;
  readonly durationMs: number;
}

/** Spend incurred by a provider call in an agent process. */
export interface IBudgetSpendMessage {
  readonly amount: number;
  readonly agentId?: string | undefined;
  readonly provider?: string | undefined;
  readonly model?: string | undefined;
  readonly taskId?: string | undefined;
}

// ── Coordinator → Agent ──────────────────────────────────────────────────

export interface ITaskAbandonMessage {
  readonly taskId: string;
  readonly agentId: string;
  readonly attempt: number;
  readonly reason: ITaskError;
}

/** Current window as seen by the BudgetController. */
export interface IBudgetUpdatedMessage {
  readonly windowStart: number;
  readonly limit: number;
  readonly consumed: number;
  readonly tier: BudgetTier;
}

// ── Registry → Orchestrator ──────────────────────────────────────────────

export interface IAgentTaskReleasedMessage {
  readonly agentId: string;
  readonly taskId: string;
  readonly reason: string;
}

// ── Outbound ─────────────────────────────────────────────────────────────

export interface IAgentStatusChangedMessage {
  readonly agentId: string;
  readonly oldState?: AgentState | undefined;
  readonly newState: AgentState;
}

export interface ITaskStateChangedMessage {
  readonly taskId: string;
  readonly workflowId: string;
  readonly oldState: TaskState;
  readonly newState: TaskState;
  readonly attempt: number;
  readonly error?: ITaskError | undefined;
}

export interface IWorkflowCompletedMessage {
  readonly workflowId: string;
  readonly finalState: WorkflowState;
}

export interface IBudgetTierChangedMessage {
  readonly oldTier: BudgetTier;
  readonly newTier: BudgetTier;
  readonly ratio: number;
}

// ── Direct Messages ──────────────────────────────────────────────────────

/** Addressed to one agent, or to every listener when `recipientId` is absent. */
export interface IAgentMessage {
  readonly messageId: string;
  readonly senderId: string;
  readonly recipientId?: string | undefined;
  readonly kind: string;
  readonly payload: Readonly<Record<string, unknown>>;
  /** Set on a reply: the `messageId` of the request it answers. */
  readonly replyTo?: string | undefined;
}

// ── Topic Map ────────────────────────────────────────────────────────────

export interface ITopicMap {
  "agent.announce": IAgentAnnounceMessage;
  "agent.heartbeat": IHeartbeatMessage;
  "agent.fault": IAgentFaultMessage;
  "agent.status_changed": IAgentStatusChangedMessage;
  "agent.task_released": IAgentTaskReleasedMessage;
  "task.started": ITaskStartedMessage;
  "task.completed": ITaskCompletedMessage;
  "task.failed": ITaskFailedMessage;
  "task.abandon": ITaskAbandonMessage;
  "task.state_changed": ITaskStateChangedMessage;
  "workflow.completed": IWorkflowCompletedMessage;
  "budget.tier_changed": IBudgetTierChangedMessage;
  "budget.spend": IBudgetSpendMessage;
  "budget.updated": IBudgetUpdatedMessage;
  "agent.message": IAgentMessage;
}

export type Topic = keyof ITopicMap;

export const TOPICS: readonly Topic[] = [
  "agent.announce",
  "agent.heartbeat",
  "agent.fault",
  "agent.status_changed",
  "agent.task_released",
  "task.started",
  "task.completed",
  "task.failed",
  "task.abandon",
  "task.state_changed",
  "workflow.completed",
  "budget.tier_changed",
  "budget.spend",
  "budget.updated",
  "agent.message",
] as const;

export function isTopic(value: string): value is Topic {
  return TOPICS.some((topic) => topic === value);
}
