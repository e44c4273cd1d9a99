/**
 * crewline typed error hierarchy
 * Every error carries a stable code, a taxonomy kind, a user message,
 * and optional diagnostic / recovery text.
 */

// ── Error Taxonomy ───────────────────────────────────────────────────────

/**
 * Classification carried on task and workflow events.
 * `budget_exceeded` is a routing signal (downgrade to the local tier), never a task failure.
 */
export type ErrorKind =
  | "agent_unavailable"
  | "task_timeout"
  | "provider_exhausted"
  | "budget_exceeded"
  | "dependency_failed"
  | "validation_error"
  | "cancelled"
  | "execution_failed";

/** Kinds that count against a task's attempt budget. */
export const TRANSIENT_ERROR_KINDS: readonly ErrorKind[] = [
  "task_timeout",
  "provider_exhausted",
  "execution_failed",
  "agent_unavailable",
] as const;

export function isTransientKind(kind: ErrorKind): boolean {
  return TRANSIENT_ERROR_KINDS.includes(kind);
}

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
}

export abstract class CrewlineError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;
  abstract readonly userMessage: string;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: Partial<IErrorContext>) {
    super(message);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Validation Errors ────────────────────────────────────────────────────

export class ValidationError extends CrewlineError {
  readonly code = "CREWLINE_VALIDATION_001" as const;
  readonly kind = "validation_error" as const;
  readonly userMessage: string;
  readonly issues: readonly string[];

  constructor(subject: string, issues: readonly string[]) {
    super(`Invalid ${subject}: ${issues.join("; ")}`);
    this.issues = issues;
    this.userMessage = `The ${subject} was rejected: ${issues.join("; ")}`;
  }
}

export class InvalidConfigError extends CrewlineError {
  readonly code = "CREWLINE_CONFIG_INVALID_001" as const;
  readonly kind = "validation_error" as const;
  readonly userMessage: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`);
    this.userMessage = `Invalid configuration "${key}": ${reason}`;
  }
}

// ── Agent Errors ─────────────────────────────────────────────────────────

export class AgentNotFoundError extends CrewlineError {
  readonly code = "CREWLINE_AGENT_NOTFOUND_001" as const;
  readonly kind = "agent_unavailable" as const;
  readonly userMessage: string;

  constructor(agentId: string) {
    super(`Agent not found: ${agentId}`);
    this.userMessage = `No agent is registered with id "${agentId}".`;
    this.suggestedRecovery = "Register the agent again.";
  }
}

export class InvalidTransitionError extends CrewlineError {
  readonly code = "CREWLINE_AGENT_TRANSITION_001" as const;
  readonly kind = "validation_error" as const;
  readonly userMessage: string;

  constructor(agentId: string, from: string, to: string) {
    super(`Agent ${agentId} cannot move from ${from} to ${to}`);
    this.userMessage = `Agent "${agentId}" is ${from} and cannot become ${to}.`;
  }
}

export class AgentUnavailableError extends CrewlineError {
  readonly code = "CREWLINE_AGENT_UNAVAILABLE_001" as const;
  readonly kind = "agent_unavailable" as const;
  readonly userMessage: string;

  constructor(agentId: string, reason: string) {
    super(`agent ${agentId} lost: ${reason}`);
    this.userMessage = `Agent "${agentId}" stopped serving its task: ${reason}`;
  }
}

// ── Task Errors ──────────────────────────────────────────────────────────

export class TaskTimeoutError extends CrewlineError {
  readonly code = "CREWLINE_TASK_TIMEOUT_001" as const;
  readonly kind = "task_timeout" as const;
  readonly userMessage: string;

  constructor(subject: string, timeoutMs: number) {
    super(`${subject} timed out after ${timeoutMs}ms`);
    this.userMessage = `${subject} timed out after ${Math.ceil(timeoutMs / 1000)}s.`;
  }
}

export class WorkflowNotFoundError extends CrewlineError {
  readonly code = "CREWLINE_WORKFLOW_NOTFOUND_001" as const;
  readonly kind = "validation_error" as const;
  readonly userMessage: string;

  constructor(workflowId: string) {
    super(`Workflow not found: ${workflowId}`);
    this.userMessage = `No workflow with id "${workflowId}".`;
  }
}

// ── Provider Errors ──────────────────────────────────────────────────────

export interface IProviderAttempt {
  readonly provider: string;
  readonly outcome: "failed" | "circuit_open" | "not_configured";
  readonly error?: string | undefined;
  readonly latencyMs: number;
}

export class ProviderCallError extends CrewlineError {
  readonly code = "CREWLINE_PROVIDER_CALL_001" as const;
  readonly kind = "provider_exhausted" as const;
  readonly userMessage: string;
  readonly provider: string;

  constructor(provider: string, reason: string) {
    super(`Provider ${provider} call failed: ${reason}`);
    this.provider = provider;
    this.userMessage = `Provider "${provider}" failed: ${reason}`;
  }
}

export class ProviderExhaustedError extends CrewlineError {
  readonly code = "CREWLINE_PROVIDER_EXHAUSTED_001" as const;
  readonly kind = "provider_exhausted" as const;
  readonly userMessage: string;
  readonly tier: string;
  readonly attempts: readonly IProviderAttempt[];

  constructor(tier: string, attempts: readonly IProviderAttempt[]) {
    const summary = attempts.length > 0
      ? attempts.map((a) => `${a.provider}(${a.outcome})`).join(", ")
      : "empty chain";
    super(`All providers in the ${tier} tier failed: ${summary}`);
    this.tier = tier;
    this.attempts = attempts;
    this.userMessage = `No ${tier} backend could serve the request: ${summary}`;
    this.suggestedRecovery = "Wait for provider cooldown or add a fallback provider to the tier chain.";
  }
}

// ── Transport Errors ─────────────────────────────────────────────────────

export class TransportError extends CrewlineError {
  readonly code = "CREWLINE_TRANSPORT_001" as const;
  readonly kind = "execution_failed" as const;
  readonly userMessage: string;

  constructor(message: string) {
    super(`Transport error: ${message}`);
    this.userMessage = `Message transport error: ${message}`;
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────

/** Map any thrown value to a taxonomy kind and a human-readable detail. */
export function describeError(error: unknown): { kind: ErrorKind; detail: string } {
  if (error instanceof CrewlineError) {
    return { kind: error.kind, detail: error.message };
  }
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return { kind: "cancelled", detail: error.message };
    }
    return { kind: "execution_failed", detail: error.message };
  }
  return { kind: "execution_failed", detail: String(error) };
}

// ── Discriminated Error Union ────────────────────────────────────────────

export type AgentError =
  | AgentNotFoundError
  | InvalidTransitionError
  | AgentUnavailableError;

export type TaskError =
  | TaskTimeoutError
  | WorkflowNotFoundError;

export type ProviderError =
  | ProviderCallError
  | ProviderExhaustedError;

export type AnyCrewlineError =
  | ValidationError
  | InvalidConfigError
  | AgentError
  | TaskError
  | ProviderError
  | TransportError;
