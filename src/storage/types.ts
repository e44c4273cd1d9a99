/**
 * Persistence collaborator. Write-through only: in-memory state stays
 * authoritative and a failing adapter never blocks orchestration.
 */

import type { IAgentDescriptor } from "../types/agent.js";
import type { ITask, IWorkflowSnapshot } from "../types/task.js";

export interface IPersistenceAdapter {
  saveTaskResult(task: Readonly<ITask>): Promise<void>;
  saveWorkflow(workflow: IWorkflowSnapshot): Promise<void>;
  saveAgentConfig(agentId: string, descriptor: IAgentDescriptor): Promise<void>;
  loadAgentConfig(agentId: string): Promise<IAgentDescriptor | undefined>;
}
