/**
 * zod schemas for every bus topic and for task envelopes.
 * Messages arriving from a transport are parsed here before delivery.
 */

import { z } from "zod";
import type { ITopicMap, Topic } from "../types/message.js";
import type { ITaskEnvelope } from "../types/task.js";

const AgentStateSchema = z.enum(["initializing", "idle", "busy", "error", "offline"]);

const TaskStateSchema = z.enum([
  "pending",
  "ready",
  "assigned",
  "running",
  "succeeded",
  "failed",
  "skipped",
]);

const WorkflowStateSchema = z.enum([
  "running",
  "partially_failed",
  "succeeded",
  "failed",
  "cancelled",
]);

const BudgetTierSchema = z.enum(["premium", "standard", "local"]);

const TaskErrorSchema = z.object({
  kind: z.enum([
    "agent_unavailable",
    "task_timeout",
    "provider_exhausted",
    "budget_exceeded",
    "dependency_failed",
    "validation_error",
    "cancelled",
    "execution_failed",
  ]),
  detail: z.string(),
});

const attempt = z.number().int().positive();

export const TaskEnvelopeSchema: z.ZodType<ITaskEnvelope> = z.object({
  taskId: z.string().min(1),
  workflowId: z.string().min(1),
  attempt,
  type: z.string(),
  description: z.string(),
  requiredCapabilities: z.array(z.string()),
  params: z.record(z.unknown()),
  inputs: z.record(z.unknown()).optional(),
});

export const TOPIC_SCHEMAS: { readonly [K in Topic]: z.ZodType<ITopicMap[K]> } = {
  "agent.announce": z.object({
    agentId: z.string().min(1),
    name: z.string().optional(),
    role: z.string(),
    capabilities: z.array(z.string()),
    modelPreference: z.array(z.string()).optional(),
  }),
  "agent.heartbeat": z.object({ agentId: z.string(), healthy: z.boolean() }),
  "agent.fault": z.object({ agentId: z.string(), detail: z.string() }),
  "agent.status_changed": z.object({
    agentId: z.string(),
    oldState: AgentStateSchema.optional(),
    newState: AgentStateSchema,
  }),
  "agent.task_released": z.object({
    agentId: z.string(),
    taskId: z.string(),
    reason: z.string(),
  }),
  "task.started": z.object({ taskId: z.string(), agentId: z.string(), attempt }),
  "task.completed": z.object({
    taskId: z.string(),
    agentId: z.string(),
    attempt,
    result: z.unknown(),
    durationMs: z.number().nonnegative(),
  }),
  "task.failed": z.object({
    taskId: z.string(),
    agentId: z.string(),
    attempt,
    error: TaskErrorSchema,
    durationMs: z.number().nonnegative(),
  }),
  "task.abandon": z.object({
    taskId: z.string(),
    agentId: z.string(),
    attempt,
    reason: TaskErrorSchema,
  }),
  "task.state_changed": z.object({
    taskId: z.string(),
    workflowId: z.string(),
    oldState: TaskStateSchema,
    newState: TaskStateSchema,
    attempt: z.number().int().nonnegative(),
    error: TaskErrorSchema.optional(),
  }),
  "workflow.completed": z.object({
    workflowId: z.string(),
    finalState: WorkflowStateSchema,
  }),
  "budget.tier_changed": z.object({
    oldTier: BudgetTierSchema,
    newTier: BudgetTierSchema,
    ratio: z.number(),
  }),
  "budget.spend": z.object({
    amount: z.number().nonnegative().finite(),
    agentId: z.string().optional(),
    provider: z.string().optional(),
    model: z.string().optional(),
    taskId: z.string().optional(),
  }),
  "budget.updated": z.object({
    windowStart: z.number(),
    limit: z.number().positive(),
    consumed: z.number().nonnegative(),
    tier: BudgetTierSchema,
  }),
  "agent.message": z.object({
    messageId: z.string().min(1),
    senderId: z.string().min(1),
    recipientId: z.string().min(1).optional(),
    kind: z.string().min(1),
    payload: z.record(z.unknown()),
    replyTo: z.string().min(1).optional(),
  }),
};
