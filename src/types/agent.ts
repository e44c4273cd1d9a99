/**
 * Agent types: identity, lifecycle state, metrics
 */

// ── Lifecycle State ──────────────────────────────────────────────────────

/**
 * initializing → idle ⇄ busy; idle/busy → error → idle; any → offline (terminal).
 */
export type AgentState = "initializing" | "idle" | "busy" | "error" | "offline";

// ── Registration ─────────────────────────────────────────────────────────

/** What an agent submits when it registers. */
export interface IAgentDescriptor {
  readonly id?: string | undefined;
  readonly name?: string | undefined;
  readonly role: string;
  readonly capabilities: readonly string[];
  readonly modelPreference?: readonly string[] | undefined;
}

/** Read-only view of a registered agent. */
export interface IAgentInfo {
  readonly id: string;
  readonly name: string;
  readonly role: string;
  readonly capabilities: readonly string[];
  readonly state: AgentState;
  readonly currentTaskId?: string | undefined;
  readonly lastHeartbeat: Date;
  readonly lastAssignedAt?: Date | undefined;
  readonly modelPreference: readonly string[];
  readonly registeredAt: Date;
  readonly fault?: string | undefined;
}

// ── Metrics ──────────────────────────────────────────────────────────────

export interface IAgentMetrics {
  readonly agentId: string;
  readonly tasksCompleted: number;
  readonly tasksFailed: number;
  readonly totalExecutionMs: number;
  readonly averageExecutionMs: number;
  readonly successRate: number;
  readonly lastActivity?: Date | undefined;
}

export interface IHeartbeatReport {
  readonly healthy?: boolean | undefined;
}
