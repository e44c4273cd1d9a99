/**
 * Shared types barrel export
 */

export type {
  AgentState,
  IAgentDescriptor,
  IAgentInfo,
  IAgentMetrics,
  IHeartbeatReport,
} from "./agent.js";

export type {
  TaskState,
  ITaskError,
  WorkflowMode,
  ITaskSpec,
  IWorkflowSpec,
  ITask,
  ITaskEnvelope,
  WorkflowState,
  IWorkflow,
  IWorkflowSnapshot,
} from "./task.js";
export { TERMINAL_TASK_STATES, isTerminalTaskState } from "./task.js";

export type { BudgetTier, ISpendSource, IBudgetSnapshot, ISpendBreakdown, IBudgetLedger } from "./budget.js";
export { TIER_ORDER } from "./budget.js";

export type {
  ProviderKind,
  CircuitState,
  IProviderHealth,
  IGenerateParams,
  IGenerateResult,
} from "./provider.js";

export type {
  IAgentAnnounceMessage,
  IHeartbeatMessage,
  IAgentFaultMessage,
  ITaskStartedMessage,
  ITaskCompletedMessage,
  ITaskFailedMessage,
  ITaskAbandonMessage,
  IAgentTaskReleasedMessage,
  IAgentStatusChangedMessage,
  ITaskStateChangedMessage,
  IWorkflowCompletedMessage,
  IBudgetTierChangedMessage,
  IBudgetSpendMessage,
  IBudgetUpdatedMessage,
  IAgentMessage,
  ITopicMap,
  Topic,
} from "./message.js";
export { TOPICS, isTopic } from "./message.js";

export type {
  IProviderConfig,
  IBudgetConfig,
  ICircuitBreakerConfig,
  IRetryConfig,
  ITimeoutConfig,
  IHeartbeatConfig,
  IPersistenceConfig,
  ITransportConfig,
  ICoordinatorConfig,
} from "./config.js";
export { DEFAULT_CONFIG } from "./config.js";

export type {
  ErrorKind,
  IErrorContext,
  IProviderAttempt,
  AgentError,
  TaskError,
  ProviderError,
  AnyCrewlineError,
} from "./errors.js";
export {
  TRANSIENT_ERROR_KINDS,
  isTransientKind,
  CrewlineError,
  ValidationError,
  InvalidConfigError,
  AgentNotFoundError,
  InvalidTransitionError,
  AgentUnavailableError,
  TaskTimeoutError,
  WorkflowNotFoundError,
  ProviderCallError,
  ProviderExhaustedError,
  TransportError,
  describeError,
} from "./errors.js";
