/**
 * Agent-side and messaging barrel export
 */

export { InMemoryMessageBus, Subscription } from "./message-bus.js";
export type { AgentMessageDraft, BusFrame, IMessageBus, IMessageBusOptions, IMessageTransport, TopicHandlers } from "./message-bus.js";
export { TaskEnvelopeSchema, TOPIC_SCHEMAS } from "./message-schemas.js";
export { AgentRegistry } from "./agent-registry.js";
export type { IAgentRegistryOptions, ITaskOutcome } from "./agent-registry.js";
export { AgentWorker, routeWith } from "./agent-worker.js";
export type { MessageHandler, TaskExecutor, IAgentWorkerOptions } from "./agent-worker.js";
