import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InMemoryMessageBus } from "./message-bus.js";
import type { BusFrame, IMessageTransport } from "./message-bus.js";
import type { ITaskEnvelope } from "../types/task.js";

function envelope(taskId: string): ITaskEnvelope {
  return {
    taskId,
    workflowId: "wf-1",
    attempt: 1,
    type: "code",
    description: "write code",
    requiredCapabilities: [],
    params: {},
  };
}

class FakeTransport implements IMessageTransport {
  readonly sent: BusFrame[] = [];
  readonly remoteAgents = new Set<string>();
  private handler: ((frame: BusFrame) => void) | undefined;

  send(frame: BusFrame): Promise<boolean> {
    this.sent.push(frame);
    return Promise.resolve(true);
  }

  onReceive(handler: (frame: BusFrame) => void): () => void {
    this.handler = handler;
    return () => {
      this.handler = undefined;
    };
  }

  owns(agentId: string): boolean {
    return this.remoteAgents.has(agentId);
  }

  receive(frame: BusFrame): void {
    this.handler?.(frame);
  }
}

describe("InMemoryMessageBus", () => {
  let bus: InMemoryMessageBus;

  beforeEach(() => {
    bus = new InMemoryMessageBus();
  });

  afterEach(() => {
    bus.destroy();
  });

  describe("publish/subscribe", () => {
    it("delivers to every subscriber with independent cursors", async () => {
      const first = bus.subscribe("agent.fault");
      const second = bus.subscribe("agent.fault");

      bus.publish("agent.fault", { agentId: "a1", detail: "disk full" });
      bus.publish("agent.fault", { agentId: "a2", detail: "oom" });

      expect((await first.next()).value).toEqual({ agentId: "a1", detail: "disk full" });
      expect((await first.next()).value).toEqual({ agentId: "a2", detail: "oom" });
      expect((await second.next()).value).toEqual({ agentId: "a1", detail: "disk full" });
      expect(second.backlog).toBe(1);
    });

    it("does not replay messages published before subscription", async () => {
      bus.publish("agent.fault", { agentId: "a1", detail: "early" });
      const late = bus.subscribe("agent.fault");
      bus.publish("agent.fault", { agentId: "a1", detail: "late" });

      expect((await late.next()).value).toEqual({ agentId: "a1", detail: "late" });
      expect(late.backlog).toBe(0);
    });

    it("resolves a waiting consumer when a message arrives", async () => {
      const subscription = bus.subscribe("workflow.completed");
      const pending = subscription.next();

      bus.publish("workflow.completed", { workflowId: "wf-1", finalState: "succeeded" });

      expect(await pending).toEqual({
        value: { workflowId: "wf-1", finalState: "succeeded" },
        done: false,
      });
    });

    it("ends iteration on close and unregisters the subscriber", async () => {
      const subscription = bus.subscribe("agent.fault");
      expect(bus.subscriberCount("agent.fault")).toBe(1);

      const received: string[] = [];
      const loop = (async () => {
        for await (const message of subscription) {
          received.push(message.detail);
        }
      })();

      bus.publish("agent.fault", { agentId: "a1", detail: "one" });
      await Promise.resolve();
      subscription.close();
      await loop;

      expect(received).toEqual(["one"]);
      expect(bus.subscriberCount("agent.fault")).toBe(0);
    });
  });

  describe("merged subscriptions", () => {
    it("dispatches several topics in publish order", async () => {
      const seen: string[] = [];
      const events = bus.subscribeMerged({
        "task.started": (message) => seen.push(`started ${message.taskId}`),
        "task.completed": (message) => seen.push(`completed ${message.taskId}`),
        "agent.fault": (message) => seen.push(`fault ${message.agentId}`),
      });

      bus.publish("task.started", { taskId: "t1", agentId: "a1", attempt: 1 });
      bus.publish("agent.fault", { agentId: "a2", detail: "oom" });
      bus.publish("agent.heartbeat", { agentId: "a1", healthy: true });
      bus.publish("task.completed", { taskId: "t1", agentId: "a1", attempt: 1, durationMs: 5 });
      bus.publish("task.started", { taskId: "t2", agentId: "a1", attempt: 1 });

      expect(events.backlog).toBe(4);
      while (events.backlog > 0) {
        const next = await events.next();
        if (!next.done) next.value();
      }
      expect(seen).toEqual(["started t1", "fault a2", "completed t1", "started t2"]);
    });

    it("stops receiving once closed", () => {
      const events = bus.subscribeMerged({ "agent.fault": () => undefined });
      events.close();

      bus.publish("agent.fault", { agentId: "a1", detail: "late" });
      expect(events.backlog).toBe(0);
    });
  });

  describe("direct messages", () => {
    it("pairs a request with the reply that names it", async () => {
      const inbox = bus.subscribe("agent.message");
      const pending = bus.request({ senderId: "lead", recipientId: "dev-1", kind: "estimate", payload: { task: "parser" } }, 1_000);

      const next = await inbox.next();
      if (next.done) throw new Error("inbox closed");
      const request = next.value;
      expect(request).toMatchObject({ senderId: "lead", recipientId: "dev-1", kind: "estimate", payload: { task: "parser" } });

      bus.sendMessage({ senderId: "dev-2", recipientId: "lead", kind: "estimate", payload: { hours: 9 }, replyTo: "other" });
      bus.sendMessage({ senderId: "dev-1", recipientId: "dev-3", kind: "estimate", payload: { hours: 5 }, replyTo: request.messageId });
      const replyId = bus.sendMessage({
        senderId: "dev-1",
        recipientId: "lead",
        kind: "estimate",
        payload: { hours: 3 },
        replyTo: request.messageId,
      });

      expect(await pending).toEqual({
        messageId: replyId,
        senderId: "dev-1",
        recipientId: "lead",
        kind: "estimate",
        payload: { hours: 3 },
        replyTo: request.messageId,
      });
      expect(bus.subscriberCount("agent.message")).toBe(1);
    });

    it("gives up after the timeout", async () => {
      const reply = await bus.request({ senderId: "lead", recipientId: "ghost", kind: "status", payload: {} }, 10);

      expect(reply).toBeUndefined();
      expect(bus.subscriberCount("agent.message")).toBe(0);
    });
  });

  describe("task queues", () => {
    it("delivers envelopes in FIFO order per agent", async () => {
      bus.enqueueTask("a1", envelope("t1"));
      bus.enqueueTask("a1", envelope("t2"));
      bus.enqueueTask("a2", envelope("t3"));

      expect((await bus.dequeueTask("a1", 10))?.taskId).toBe("t1");
      expect((await bus.dequeueTask("a1", 10))?.taskId).toBe("t2");
      expect((await bus.dequeueTask("a2", 10))?.taskId).toBe("t3");
    });

    it("wakes a blocked pull when a task is enqueued", async () => {
      const pull = bus.dequeueTask("a1", 1_000);
      bus.enqueueTask("a1", envelope("t1"));

      expect((await pull)?.taskId).toBe("t1");
      expect(bus.getQueueSize("a1")).toBe(0);
    });

    it("returns undefined after the timeout", async () => {
      expect(await bus.dequeueTask("a1", 5)).toBeUndefined();
    });

    it("resolves pending pulls with undefined on destroy", async () => {
      const pull = bus.dequeueTask("a1", 10_000);
      bus.destroy();
      expect(await pull).toBeUndefined();
    });
  });

  describe("transport bridge", () => {
    it("forwards publishes and remote-owned enqueues to the transport", () => {
      const transport = new FakeTransport();
      transport.remoteAgents.add("remote-1");
      const bridged = new InMemoryMessageBus({ transport });

      bridged.publish("agent.heartbeat", { agentId: "a1", healthy: true });
      bridged.enqueueTask("remote-1", envelope("t1"));
      bridged.enqueueTask("local-1", envelope("t2"));

      expect(transport.sent).toEqual([
        { kind: "publish", topic: "agent.heartbeat", message: { agentId: "a1", healthy: true } },
        { kind: "enqueue", agentId: "remote-1", envelope: envelope("t1") },
      ]);
      expect(bridged.getQueueSize("local-1")).toBe(1);
      bridged.destroy();
    });

    it("delivers valid incoming frames locally and drops malformed ones", async () => {
      const transport = new FakeTransport();
      const bridged = new InMemoryMessageBus({ transport });
      const subscription = bridged.subscribe("agent.heartbeat");

      transport.receive({ kind: "publish", topic: "agent.heartbeat", message: { agentId: 7 } });
      transport.receive({ kind: "publish", topic: "agent.heartbeat", message: { agentId: "a9", healthy: false } });
      transport.receive({ kind: "enqueue", agentId: "a9", envelope: envelope("t9") });
      transport.receive({ kind: "enqueue", agentId: "a9", envelope: { taskId: "" } });

      expect((await subscription.next()).value).toEqual({ agentId: "a9", healthy: false });
      expect(subscription.backlog).toBe(0);
      expect(bridged.getQueueSize("a9")).toBe(1);
      expect(transport.sent).toEqual([]);
      bridged.destroy();
    });
  });
});
