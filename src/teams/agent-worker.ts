/**
 * AgentWorker: the agent side of the bus.
 *
 * Heartbeats on an interval, pulls envelopes from its queue one at a time,
 * and reports task.started / task.completed / task.failed. A matching
 * task.abandon aborts the running executor; its outcome is then dropped.
 * Direct messages addressed to the agent are answered: `status` by the
 * worker itself, other kinds by the `onMessage` handler.
 */

import type { ProviderRouter } from "../core/provider-router.js";
import { describeError } from "../types/errors.js";
import type { ITaskEnvelope } from "../types/task.js";
import type { IAgentAnnounceMessage, IAgentMessage, ITaskAbandonMessage } from "../types/message.js";
import { logger } from "../utils/logger.js";
import type { IMessageBus, Subscription } from "./message-bus.js";

// ── Public Types ──────────────────────────────────────────────────────

/** Runs one attempt. Rejections are reported as task.failed. */
export type TaskExecutor = (envelope: ITaskEnvelope, signal: AbortSignal) => Promise<unknown>;

/** Answers a direct message. Returning undefined sends no reply. */
export type MessageHandler = (
  message: IAgentMessage,
) => Promise<Readonly<Record<string, unknown>> | undefined> | Readonly<Record<string, unknown>> | undefined;

export interface IAgentWorkerOptions {
  readonly agentId: string;
  readonly executor: TaskExecutor;
  readonly heartbeatIntervalMs: number;
  /**
   * Published as agent.announce before the first heartbeat, for agents the
   * coordinator has not registered itself.
   */
  readonly announce?: Omit<IAgentAnnounceMessage, "agentId"> | undefined;
  /** How long one pull waits; also bounds how long `stop()` can take. */
  readonly dequeueTimeoutMs?: number | undefined;
  readonly onMessage?: MessageHandler | undefined;
  readonly now?: (() => number) | undefined;
}

const DEFAULT_DEQUEUE_TIMEOUT_MS = 1_000;

interface IRunningTask {
  readonly envelope: ITaskEnvelope;
  readonly controller: AbortController;
}

/**
 * Default executor: send the task through the provider router and use the
 * generated text as the result.
 */
export function routeWith(router: ProviderRouter, modelPreference?: readonly string[]): TaskExecutor {
  return async (envelope, signal) => {
    const routed = await router.route(
      {
        id: envelope.taskId,
        type: envelope.type,
        description: envelope.description,
        params: envelope.params,
        inputs: envelope.inputs,
      },
      { preference: modelPreference, signal },
    );
    return routed.text;
  };
}

// ── AgentWorker ───────────────────────────────────────────────────────

export class AgentWorker {
  private readonly bus: IMessageBus;
  private readonly agentId: string;
  private readonly executor: TaskExecutor;
  private readonly announce: Omit<IAgentAnnounceMessage, "agentId"> | undefined;
  private readonly heartbeatIntervalMs: number;
  private readonly dequeueTimeoutMs: number;
  private readonly onMessage: MessageHandler | undefined;
  private readonly now: () => number;

  private running = false;
  private current: IRunningTask | undefined;
  private heartbeatTimer: ReturnType<typeof setInterval> | undefined;
  private abandonSubscription: Subscription<ITaskAbandonMessage> | undefined;
  private messageSubscription: Subscription<IAgentMessage> | undefined;
  private loops: Promise<void>[] = [];

  constructor(bus: IMessageBus, options: IAgentWorkerOptions) {
    this.bus = bus;
    this.agentId = options.agentId;
    this.executor = options.executor;
    this.announce = options.announce;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs;
    this.dequeueTimeoutMs = options.dequeueTimeoutMs ?? DEFAULT_DEQUEUE_TIMEOUT_MS;
    this.onMessage = options.onMessage;
    this.now = options.now ?? Date.now;
  }

  get id(): string {
    return this.agentId;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** The envelope being executed, if any. */
  get currentTask(): ITaskEnvelope | undefined {
    return this.current?.envelope;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    const abandons = this.bus.subscribe("task.abandon");
    this.abandonSubscription = abandons;
    const messages = this.bus.subscribe("agent.message");
    this.messageSubscription = messages;

    if (this.announce) {
      this.bus.publish("agent.announce", { ...this.announce, agentId: this.agentId });
    }
    this.sendHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      this.sendHeartbeat();
    }, this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();

    this.loops = [this.watchAbandons(abandons), this.answerMessages(messages), this.pullLoop()];
    logger.info({ agentId: this.agentId }, "Agent worker started");
  }

  /** Stop pulling, abort the running attempt, and wait for the loops to end. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
    this.current?.controller.abort(new Error("agent worker stopped"));
    this.abandonSubscription?.close();
    this.abandonSubscription = undefined;
    this.messageSubscription?.close();
    this.messageSubscription = undefined;

    await Promise.all(this.loops);
    this.loops = [];
    logger.info({ agentId: this.agentId }, "Agent worker stopped");
  }

  // ── Loops ───────────────────────────────────────────────────────────

  private async pullLoop(): Promise<void> {
    while (this.running) {
      const envelope = await this.bus.dequeueTask(this.agentId, this.dequeueTimeoutMs);
      if (!envelope) continue;
      if (!this.running) {
        logger.warn({ agentId: this.agentId, taskId: envelope.taskId }, "Worker stopped with a task in hand");
        return;
      }
      await this.runTask(envelope);
    }
  }

  private async watchAbandons(abandons: Subscription<ITaskAbandonMessage>): Promise<void> {
    for await (const message of abandons) {
      const current = this.current;
      if (
        message.agentId !== this.agentId ||
        !current ||
        current.envelope.taskId !== message.taskId ||
        current.envelope.attempt !== message.attempt
      ) {
        continue;
      }
      logger.info({ agentId: this.agentId, taskId: message.taskId, reason: message.reason }, "Task abandoned");
      current.controller.abort(new Error(message.reason.detail));
    }
  }

  private async answerMessages(messages: Subscription<IAgentMessage>): Promise<void> {
    for await (const message of messages) {
      if (message.recipientId !== this.agentId || message.replyTo !== undefined) continue;

      let payload: Readonly<Record<string, unknown>> | undefined;
      try {
        payload = message.kind === "status" ? this.status() : await this.onMessage?.(message);
      } catch (error: unknown) {
        logger.warn({ agentId: this.agentId, kind: message.kind, error: describeError(error) }, "Message handler failed");
        continue;
      }
      if (payload === undefined) continue;

      this.bus.sendMessage({
        senderId: this.agentId,
        recipientId: message.senderId,
        kind: message.kind,
        payload,
        replyTo: message.messageId,
      });
    }
  }

  private status(): Readonly<Record<string, unknown>> {
    const current = this.current;
    return current
      ? { agentId: this.agentId, busy: true, taskId: current.envelope.taskId, attempt: current.envelope.attempt }
      : { agentId: this.agentId, busy: false };
  }

  private async runTask(envelope: ITaskEnvelope): Promise<void> {
    const controller = new AbortController();
    this.current = { envelope, controller };
    const { taskId, attempt } = envelope;
    const startedAt = this.now();

    this.bus.publish("task.started", { taskId, agentId: this.agentId, attempt });
    logger.debug({ agentId: this.agentId, taskId, attempt }, "Task started");

    try {
      const result = await this.executor(envelope, controller.signal);
      if (controller.signal.aborted) {
        logger.debug({ agentId: this.agentId, taskId }, "Discarding result of abandoned task");
        return;
      }
      this.bus.publish("task.completed", {
        taskId,
        agentId: this.agentId,
        attempt,
        result,
        durationMs: this.now() - startedAt,
      });
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        logger.debug({ agentId: this.agentId, taskId }, "Abandoned task stopped");
        return;
      }
      const described = describeError(error);
      logger.warn({ agentId: this.agentId, taskId, attempt, error: described }, "Task failed");
      this.bus.publish("task.failed", {
        taskId,
        agentId: this.agentId,
        attempt,
        error: described,
        durationMs: this.now() - startedAt,
      });
    } finally {
      this.current = undefined;
    }
  }

  private sendHeartbeat(): void {
    this.bus.publish("agent.heartbeat", { agentId: this.agentId, healthy: true });
  }
}
