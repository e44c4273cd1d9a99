/**
 * Core coordination layer barrel export
 */

export { BudgetController } from "./budget-controller.js";
export type { IBudgetControllerOptions } from "./budget-controller.js";
export { RemoteBudget } from "./remote-budget.js";
export type { IRemoteBudgetOptions } from "./remote-budget.js";

export { ProviderRouter, renderPrompt, applyPreference } from "./provider-router.js";
export type {
  IProviderRouterOptions,
  IRoutableTask,
  IExecuteOptions,
  IRouteOptions,
  IRouteResult,
} from "./provider-router.js";

export { JOIN_TASK_KEY, TaskSpecSchema, WorkflowSpecSchema, parseWorkflowSpec, planWorkflow, findCycle } from "./workflow-spec.js";
export type { IPlannedTask, IWorkflowPlan, IPlanDefaults } from "./workflow-spec.js";

export { WorkflowOrchestrator, deriveWorkflowState } from "./workflow-orchestrator.js";
export type { IWorkflowOrchestratorOptions, IListWorkflowsOptions } from "./workflow-orchestrator.js";

export { DEFAULT_TEMPLATES_PATH, parseTemplates, loadTemplates, expandTemplate } from "./workflow-templates.js";
export type { IWorkflowTemplate } from "./workflow-templates.js";

export { Coordinator } from "./coordinator.js";
export type { ICoordinatorOptions, ICoordinatorStatus } from "./coordinator.js";
