/**
 * Coordinator: builds every component from one ICoordinatorConfig and exposes
 * the inbound interface (workflows, agents, heartbeats).
 *
 * Announcements, heartbeats and faults arriving on the bus (from workers in
 * this process or behind a transport) are fed into the registry, and spend
 * reported by agent processes into the budget. Registered descriptors are
 * written through to persistence so `restoreAgent` can bring them back.
 * A stopped coordinator has destroyed its bus and cannot be started again.
 */

import type { IAgentDescriptor, IAgentInfo, IHeartbeatReport } from "../types/agent.js";
import type { IBudgetSnapshot } from "../types/budget.js";
import type { ICoordinatorConfig } from "../types/config.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { AgentNotFoundError } from "../types/errors.js";
import type { IProviderHealth } from "../types/provider.js";
import type { IWorkflowSnapshot } from "../types/task.js";
import type {
  IAgentAnnounceMessage,
  IAgentFaultMessage,
  IAgentMessage,
  IBudgetSpendMessage,
  IHeartbeatMessage,
} from "../types/message.js";
import { logger } from "../utils/logger.js";
import { createProviderRegistry } from "../providers/registry.js";
import type { ProviderRegistry } from "../providers/registry.js";
import { AgentRegistry } from "../teams/agent-registry.js";
import { AgentWorker, routeWith } from "../teams/agent-worker.js";
import type { TaskExecutor } from "../teams/agent-worker.js";
import { InMemoryMessageBus } from "../teams/message-bus.js";
import type { IMessageTransport, Subscription } from "../teams/message-bus.js";
import type { IPersistenceAdapter } from "../storage/types.js";
import { BudgetController } from "./budget-controller.js";
import { ProviderRouter } from "./provider-router.js";
import { WorkflowOrchestrator } from "./workflow-orchestrator.js";
import type { IListWorkflowsOptions } from "./workflow-orchestrator.js";

// ── Public Types ──────────────────────────────────────────────────────

export interface ICoordinatorOptions {
  readonly config?: ICoordinatorConfig | undefined;
  /** Bridges the bus to agents in other processes. */
  readonly transport?: IMessageTransport | undefined;
  /** Replaces the clients built from `config.providers`. */
  readonly providers?: ProviderRegistry | undefined;
  readonly persistence?: IPersistenceAdapter | undefined;
  readonly now?: (() => number) | undefined;
}

export interface ICoordinatorStatus {
  readonly agents: readonly IAgentInfo[];
  readonly budget: IBudgetSnapshot;
  readonly providers: readonly IProviderHealth[];
  readonly activeWorkflows: number;
}

const COORDINATOR_SENDER_ID = "coordinator";
const DEFAULT_QUERY_TIMEOUT_MS = 5_000;

// ── Coordinator ───────────────────────────────────────────────────────

export class Coordinator {
  readonly config: ICoordinatorConfig;
  readonly bus: InMemoryMessageBus;
  readonly registry: AgentRegistry;
  readonly budget: BudgetController;
  readonly providers: ProviderRegistry;
  readonly router: ProviderRouter;
  readonly orchestrator: WorkflowOrchestrator;

  private readonly persistence: IPersistenceAdapter | undefined;
  private readonly workers = new Map<string, AgentWorker>();
  private readonly now: () => number;
  private events: Subscription<() => void> | undefined;
  private pump: Promise<void> | undefined;
  private running = false;

  constructor(options?: ICoordinatorOptions) {
    this.config = options?.config ?? DEFAULT_CONFIG;
    this.persistence = options?.persistence;
    this.now = options?.now ?? Date.now;
    const now = this.now;

    this.bus = new InMemoryMessageBus({ transport: options?.transport });
    this.registry = new AgentRegistry(this.bus, { heartbeat: this.config.heartbeat, now });
    this.budget = new BudgetController(this.bus, this.config.budget, { now });
    this.providers = options?.providers ?? createProviderRegistry(this.config.providers);
    this.router = new ProviderRouter(this.providers, this.budget, {
      tiers: this.config.tiers,
      circuitBreaker: this.config.circuitBreaker,
      callTimeoutMs: this.config.timeouts.providerCallMs,
      now,
    });
    this.orchestrator = new WorkflowOrchestrator(this.bus, this.registry, {
      retry: this.config.retry,
      taskTimeoutMs: this.config.timeouts.taskMs,
      workflowTimeoutMs: this.config.timeouts.workflowMs,
      maxWorkflowHistory: this.config.maxWorkflowHistory,
      persistence: this.persistence,
      now,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;

    const events = this.bus.subscribeMerged({
      "agent.announce": (message) => this.onAnnounce(message),
      "agent.heartbeat": (message) => this.onHeartbeat(message),
      "agent.fault": (message) => this.onFault(message),
      "budget.spend": (message) => this.onSpend(message),
    });
    this.events = events;
    this.pump = this.drain(events);

    this.orchestrator.start();
    this.registry.start();
    for (const worker of this.workers.values()) {
      worker.start();
    }
    logger.info({ providers: this.providers.listProviders() }, "Coordinator started");
  }

  /** Stop workers, then the orchestrator and the sweep, then tear down the bus. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    await Promise.all([...this.workers.values()].map((worker) => worker.stop()));
    await this.orchestrator.stop();
    this.registry.stop();

    this.events?.close();
    await this.pump;
    this.events = undefined;
    this.pump = undefined;

    this.bus.destroy();
    logger.info("Coordinator stopped");
  }

  // ── Workflows ───────────────────────────────────────────────────────

  submitWorkflow(spec: unknown): string {
    return this.orchestrator.submitWorkflow(spec);
  }

  cancelWorkflow(workflowId: string, reason?: string): void {
    this.orchestrator.cancelWorkflow(workflowId, reason);
  }

  getWorkflow(workflowId: string): IWorkflowSnapshot | undefined {
    return this.orchestrator.getWorkflow(workflowId);
  }

  listWorkflows(options?: IListWorkflowsOptions): IWorkflowSnapshot[] {
    return this.orchestrator.listWorkflows(options);
  }

  waitForCompletion(workflowId: string, timeoutMs?: number): Promise<IWorkflowSnapshot> {
    return this.orchestrator.waitForCompletion(workflowId, timeoutMs);
  }

  // ── Agents ──────────────────────────────────────────────────────────

  registerAgent(descriptor: IAgentDescriptor): string {
    const agentId = this.registry.register(descriptor);
    this.remember(agentId, descriptor);
    return agentId;
  }

  /** Register an agent from the descriptor saved for it in persistence. */
  async restoreAgent(agentId: string): Promise<string> {
    const descriptor = await this.persistence?.loadAgentConfig(agentId);
    if (!descriptor) {
      throw new AgentNotFoundError(agentId);
    }
    return this.registry.register({ ...descriptor, id: agentId });
  }

  heartbeat(agentId: string, report?: IHeartbeatReport): void {
    this.registry.heartbeat(agentId, report);
  }

  deregisterAgent(agentId: string, reason?: string): void {
    this.registry.deregister(agentId, reason);
  }

  /**
   * Ask an agent a question over the bus and wait for its reply.
   * Every worker answers `status`; undefined means no reply came in time.
   */
  queryAgent(
    agentId: string,
    kind: string,
    payload: Readonly<Record<string, unknown>> = {},
    timeoutMs = DEFAULT_QUERY_TIMEOUT_MS,
  ): Promise<IAgentMessage | undefined> {
    if (!this.registry.getAgent(agentId)) {
      return Promise.reject(new AgentNotFoundError(agentId));
    }
    return this.bus.request({ senderId: COORDINATOR_SENDER_ID, recipientId: agentId, kind, payload }, timeoutMs);
  }

  /**
   * Register an agent and run it in this process. The executor defaults to
   * routing each task through the provider router with the agent's
   * model preference.
   */
  spawnWorker(descriptor: IAgentDescriptor, executor?: TaskExecutor): AgentWorker {
    const agentId = this.registerAgent(descriptor);
    const worker = new AgentWorker(this.bus, {
      agentId,
      executor: executor ?? routeWith(this.router, descriptor.modelPreference),
      heartbeatIntervalMs: this.config.heartbeat.intervalMs,
      dequeueTimeoutMs: this.config.timeouts.dequeueMs,
      now: this.now,
    });
    this.workers.set(agentId, worker);
    if (this.running) {
      worker.start();
    }
    return worker;
  }

  getStatus(): ICoordinatorStatus {
    return {
      agents: this.registry.listAgents(),
      budget: this.budget.snapshot(),
      providers: this.router.getHealth(),
      activeWorkflows: this.orchestrator.listWorkflows({ active: true }).length,
    };
  }

  // ── Bus Handlers ────────────────────────────────────────────────────

  private onAnnounce(message: IAgentAnnounceMessage): void {
    const { agentId, ...descriptor } = message;
    this.registerAgent({ ...descriptor, id: agentId });
    this.budget.broadcast();
  }

  private onHeartbeat(message: IHeartbeatMessage): void {
    this.registry.heartbeat(message.agentId, { healthy: message.healthy });
  }

  private onFault(message: IAgentFaultMessage): void {
    this.registry.reportFault(message.agentId, message.detail);
  }

  private onSpend(message: IBudgetSpendMessage): void {
    this.budget.recordSpend(message.amount, {
      provider: message.provider,
      model: message.model,
      taskId: message.taskId,
    });
  }

  private remember(agentId: string, descriptor: IAgentDescriptor): void {
    if (!this.persistence) return;
    this.persistence.saveAgentConfig(agentId, descriptor).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ agentId, error: reason }, "Failed to persist agent descriptor");
    });
  }

  private async drain(events: Subscription<() => void>): Promise<void> {
    for await (const dispatch of events) {
      try {
        dispatch();
      } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn({ error: reason }, "Dropped agent message");
      }
    }
  }
}
