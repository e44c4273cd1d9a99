/**
 * Topic pub/sub plus per-agent FIFO task queues.
 * Direct messages between agents ride on `agent.message`; `request` pairs
 * one with its reply.
 * An optional transport bridges the bus to other processes.
 */

import { randomUUID } from "node:crypto";
import type { ITaskEnvelope } from "../types/task.js";
import type { IAgentMessage, ITopicMap, Topic } from "../types/message.js";
import { TOPICS } from "../types/message.js";
import { logger } from "../utils/index.js";
import { TaskEnvelopeSchema, TOPIC_SCHEMAS } from "./message-schemas.js";

// ── Public Types ──────────────────────────────────────────────────────

/** Frames exchanged with a transport. Payloads are validated on receipt. */
export type BusFrame =
  | { readonly kind: "publish"; readonly topic: Topic; readonly message: unknown }
  | { readonly kind: "enqueue"; readonly agentId: string; readonly envelope: unknown }
  | { readonly kind: "claim"; readonly agentId: string };

/**
 * Transport layer for remote delivery (e.g., the socket broker).
 * `owns` reports whether an agent's queue lives on the far side.
 */
export interface IMessageTransport {
  send(frame: BusFrame): Promise<boolean>;
  onReceive(handler: (frame: BusFrame) => void): () => void;
  owns(agentId: string): boolean;
}

/** A direct message before the bus assigns its id. */
export type AgentMessageDraft = Omit<IAgentMessage, "messageId">;

/** Per-topic handlers for a merged subscription. */
export type TopicHandlers = { readonly [K in Topic]?: (message: ITopicMap[K]) => void };

export interface IMessageBus {
  publish<K extends Topic>(topic: K, message: ITopicMap[K]): void;
  subscribe<K extends Topic>(topic: K): Subscription<ITopicMap[K]>;
  /**
   * One stream across several topics, in publish order. Each item dispatches
   * a message to its topic's handler when called.
   */
  subscribeMerged(handlers: TopicHandlers): Subscription<() => void>;
  /** Publish a direct message and return its id. */
  sendMessage(draft: AgentMessageDraft): string;
  /** Send to one recipient and wait for its reply; undefined once `timeoutMs` passes. */
  request(draft: AgentMessageDraft & { readonly recipientId: string }, timeoutMs: number): Promise<IAgentMessage | undefined>;
  enqueueTask(agentId: string, envelope: ITaskEnvelope): void;
  dequeueTask(agentId: string, timeoutMs: number): Promise<ITaskEnvelope | undefined>;
  destroy(): void;
}

export interface IMessageBusOptions {
  readonly transport?: IMessageTransport | undefined;
}

// ── Subscription ──────────────────────────────────────────────────────

/**
 * Unbounded async iterable with its own cursor.
 * Only messages published after creation are seen.
 */
export class Subscription<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: ((result: IteratorResult<T>) => void) | undefined;
  private closed = false;
  private readonly onClose: () => void;

  constructor(onClose: () => void) {
    this.onClose = onClose;
  }

  /** Number of delivered messages not yet consumed. */
  get backlog(): number {
    return this.buffer.length;
  }

  push(message: T): void {
    if (this.closed) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value: message, done: false });
      return;
    }
    this.buffer.push(message);
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [head] = this.buffer.splice(0, 1);
      if (head !== undefined) {
        return Promise.resolve({ value: head, done: false });
      }
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer.length = 0;

    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.({ value: undefined, done: true });
    this.onClose();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

// ── InMemoryMessageBus ────────────────────────────────────────────────

type SubscriberTable = { [K in Topic]: Set<Subscription<ITopicMap[K]>> };

interface IMergedSubscriber {
  readonly handlers: TopicHandlers;
  readonly subscription: Subscription<() => void>;
}

interface IPendingPull {
  readonly resolve: (envelope: ITaskEnvelope | undefined) => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

function createSubscriberTable(): SubscriberTable {
  return {
    "agent.announce": new Set(),
    "agent.heartbeat": new Set(),
    "agent.fault": new Set(),
    "agent.status_changed": new Set(),
    "agent.task_released": new Set(),
    "task.started": new Set(),
    "task.completed": new Set(),
    "task.failed": new Set(),
    "task.abandon": new Set(),
    "task.state_changed": new Set(),
    "workflow.completed": new Set(),
    "budget.tier_changed": new Set(),
    "budget.spend": new Set(),
    "budget.updated": new Set(),
    "agent.message": new Set(),
  };
}

export class InMemoryMessageBus implements IMessageBus {
  private readonly subscribers = createSubscriberTable();
  private readonly merged = new Set<IMergedSubscriber>();
  private readonly queues = new Map<string, ITaskEnvelope[]>();
  private readonly pulls = new Map<string, IPendingPull[]>();
  private readonly transport: IMessageTransport | undefined;
  private readonly transportUnsubscribe: (() => void) | undefined;
  private destroyed = false;

  constructor(options?: IMessageBusOptions) {
    this.transport = options?.transport;

    if (this.transport) {
      this.transportUnsubscribe = this.transport.onReceive((frame) => {
        this.routeIncoming(frame);
      });
    }
  }

  publish<K extends Topic>(topic: K, message: ITopicMap[K]): void {
    if (this.destroyed) {
      logger.warn({ topic }, "MessageBus is destroyed, dropping message");
      return;
    }

    this.deliver(topic, message);
    this.forward({ kind: "publish", topic, message });
  }

  subscribe<K extends Topic>(topic: K): Subscription<ITopicMap[K]> {
    const subscribers: Set<Subscription<ITopicMap[K]>> = this.subscribers[topic];
    const subscription = new Subscription<ITopicMap[K]>(() => {
      subscribers.delete(subscription);
    });

    if (this.destroyed) {
      subscription.close();
      return subscription;
    }

    subscribers.add(subscription);
    return subscription;
  }

  subscribeMerged(handlers: TopicHandlers): Subscription<() => void> {
    const subscription = new Subscription<() => void>(() => {
      this.merged.delete(entry);
    });
    const entry: IMergedSubscriber = { handlers, subscription };

    if (this.destroyed) {
      subscription.close();
      return subscription;
    }

    this.merged.add(entry);
    return subscription;
  }

  sendMessage(draft: AgentMessageDraft): string {
    const messageId = randomUUID();
    this.publish("agent.message", { ...draft, messageId });
    return messageId;
  }

  async request(
    draft: AgentMessageDraft & { readonly recipientId: string },
    timeoutMs: number,
  ): Promise<IAgentMessage | undefined> {
    const replies = this.subscribe("agent.message");
    const timer = setTimeout(() => {
      replies.close();
    }, timeoutMs);

    try {
      const messageId = this.sendMessage(draft);
      for await (const message of replies) {
        if (message.replyTo === messageId && message.recipientId === draft.senderId) {
          return message;
        }
      }
      logger.warn(
        { senderId: draft.senderId, recipientId: draft.recipientId, kind: draft.kind, timeoutMs },
        "Request got no reply",
      );
      return undefined;
    } finally {
      clearTimeout(timer);
      replies.close();
    }
  }

  enqueueTask(agentId: string, envelope: ITaskEnvelope): void {
    if (this.destroyed) {
      logger.warn({ agentId, taskId: envelope.taskId }, "MessageBus is destroyed, dropping task");
      return;
    }

    if (this.transport?.owns(agentId)) {
      this.forward({ kind: "enqueue", agentId, envelope });
      return;
    }
    this.enqueueLocal(agentId, envelope);
  }

  dequeueTask(agentId: string, timeoutMs: number): Promise<ITaskEnvelope | undefined> {
    const queue = this.queues.get(agentId);
    if (queue && queue.length > 0) {
      const [head] = queue.splice(0, 1);
      return Promise.resolve(head);
    }
    if (this.destroyed) {
      return Promise.resolve(undefined);
    }

    return new Promise<ITaskEnvelope | undefined>((resolve) => {
      const pending: IPendingPull = {
        resolve,
        timer: setTimeout(() => {
          this.removePull(agentId, pending);
          resolve(undefined);
        }, timeoutMs),
      };
      const waiting = this.pulls.get(agentId) ?? [];
      waiting.push(pending);
      this.pulls.set(agentId, waiting);
    });
  }

  /** Announce to the transport that this process serves an agent's queue. */
  claimAgent(agentId: string): void {
    this.forward({ kind: "claim", agentId });
  }

  /** Get the number of queued envelopes for an agent. */
  getQueueSize(agentId: string): number {
    return this.queues.get(agentId)?.length ?? 0;
  }

  subscriberCount(topic: Topic): number {
    return this.subscribers[topic].size;
  }

  /** Tear down the message bus; open subscriptions end and pending pulls resolve empty. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.transportUnsubscribe?.();

    for (const topic of TOPICS) {
      this.closeAll(topic);
    }
    for (const entry of [...this.merged]) {
      entry.subscription.close();
    }
    for (const waiting of this.pulls.values()) {
      for (const pending of waiting) {
        clearTimeout(pending.timer);
        pending.resolve(undefined);
      }
    }
    this.pulls.clear();
    this.queues.clear();
    logger.debug("MessageBus destroyed");
  }

  // ── Private Routing ─────────────────────────────────────────────────

  private deliver<K extends Topic>(topic: K, message: ITopicMap[K]): void {
    const subscribers: Set<Subscription<ITopicMap[K]>> = this.subscribers[topic];
    for (const subscription of subscribers) {
      subscription.push(message);
    }
    for (const entry of this.merged) {
      const handler = entry.handlers[topic];
      if (handler) {
        entry.subscription.push(() => handler(message));
      }
    }
  }

  private closeAll(topic: Topic): void {
    for (const subscription of [...this.subscribers[topic]]) {
      subscription.close();
    }
  }

  private enqueueLocal(agentId: string, envelope: ITaskEnvelope): void {
    const waiting = this.pulls.get(agentId);
    const pending = waiting?.shift();
    if (pending) {
      clearTimeout(pending.timer);
      pending.resolve(envelope);
      return;
    }

    const queue = this.queues.get(agentId) ?? [];
    queue.push(envelope);
    this.queues.set(agentId, queue);
  }

  private removePull(agentId: string, pending: IPendingPull): void {
    const waiting = this.pulls.get(agentId);
    if (!waiting) return;
    const index = waiting.indexOf(pending);
    if (index >= 0) {
      waiting.splice(index, 1);
    }
  }

  private forward(frame: BusFrame): void {
    if (!this.transport) return;

    this.transport.send(frame).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error({ kind: frame.kind, error: reason }, "Transport delivery failed");
    });
  }

  private routeIncoming(frame: BusFrame): void {
    if (this.destroyed) return;

    switch (frame.kind) {
      case "publish":
        this.deliverUntrusted(frame.topic, frame.message);
        break;
      case "enqueue": {
        const parsed = TaskEnvelopeSchema.safeParse(frame.envelope);
        if (!parsed.success) {
          logger.warn({ agentId: frame.agentId, error: parsed.error.message }, "Dropping malformed task envelope");
          return;
        }
        this.enqueueLocal(frame.agentId, parsed.data);
        break;
      }
      case "claim":
        break;
    }
  }

  private deliverUntrusted<K extends Topic>(topic: K, raw: unknown): void {
    const parsed = TOPIC_SCHEMAS[topic].safeParse(raw);
    if (!parsed.success) {
      logger.warn({ topic, error: parsed.error.message }, "Dropping malformed bus message");
      return;
    }
    this.deliver(topic, parsed.data);
  }
}
