/**
 * Task and workflow types
 */

import type { ErrorKind } from "./errors.js";

// ── Task State ───────────────────────────────────────────────────────────

export type TaskState =
  | "pending"
  | "ready"
  | "assigned"
  | "running"
  | "succeeded"
  | "failed"
  | "skipped";

export const TERMINAL_TASK_STATES: readonly TaskState[] = ["succeeded", "failed", "skipped"] as const;

export function isTerminalTaskState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.includes(state);
}

export interface ITaskError {
  readonly kind: ErrorKind;
  readonly detail: string;
}

// ── Workflow Specification (inbound) ─────────────────────────────────────

export type WorkflowMode = "sequential" | "parallel" | "dag";

export interface ITaskSpec {
  readonly id: string;
  readonly type: string;
  readonly description: string;
  readonly requiredCapabilities?: readonly string[] | undefined;
  readonly dependsOn?: readonly string[] | undefined;
  readonly critical?: boolean | undefined;
  readonly maxAttempts?: number | undefined;
  readonly params?: Readonly<Record<string, unknown>> | undefined;
}

export interface IWorkflowSpec {
  readonly name?: string | undefined;
  readonly mode: WorkflowMode;
  readonly tasks: readonly ITaskSpec[];
  readonly timeoutMs?: number | undefined;
}

// ── Runtime Task ─────────────────────────────────────────────────────────

export interface ITask {
  /** Globally unique: `<workflowId>/<key>`. */
  readonly id: string;
  /** The id given in the spec, unique within its workflow. */
  readonly key: string;
  readonly workflowId: string;
  readonly type: string;
  readonly description: string;
  readonly requiredCapabilities: readonly string[];
  readonly dependsOn: readonly string[];
  readonly critical: boolean;
  readonly maxAttempts: number;
  readonly params: Readonly<Record<string, unknown>>;
  /** Join nodes the orchestrator settles itself without an agent. */
  readonly implicit: boolean;
  state: TaskState;
  assignedAgent?: string | undefined;
  attempt: number;
  result?: unknown;
  error?: ITaskError | undefined;
  readonly createdAt: Date;
  updatedAt: Date;
}

/** What travels on an agent's queue for one attempt. */
export interface ITaskEnvelope {
  readonly taskId: string;
  readonly workflowId: string;
  readonly attempt: number;
  readonly type: string;
  readonly description: string;
  readonly requiredCapabilities: readonly string[];
  readonly params: Readonly<Record<string, unknown>>;
  /** Results of succeeded dependencies, keyed by their local task id. */
  readonly inputs?: Readonly<Record<string, unknown>> | undefined;
}

// ── Workflow ─────────────────────────────────────────────────────────────

export type WorkflowState =
  | "running"
  | "partially_failed"
  | "succeeded"
  | "failed"
  | "cancelled";

export interface IWorkflow {
  readonly id: string;
  readonly name: string;
  readonly mode: WorkflowMode;
  /** Global task ids in submission order. */
  readonly taskIds: readonly string[];
  state: WorkflowState;
  readonly createdAt: Date;
  completedAt?: Date | undefined;
}

/** Point-in-time copy of a workflow and its tasks. */
export interface IWorkflowSnapshot {
  readonly id: string;
  readonly name: string;
  readonly mode: WorkflowMode;
  readonly state: WorkflowState;
  readonly createdAt: Date;
  readonly completedAt?: Date | undefined;
  readonly tasks: readonly Readonly<ITask>[];
}
