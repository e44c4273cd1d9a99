/**
 * Unix domain socket transport for the message bus.
 *
 * SocketBroker runs beside the coordinator and accepts agent processes.
 * SocketClient runs in an agent process. Both sides speak HMAC-signed,
 * newline-delimited frames (see frame-codec.ts).
 *
 * Routing: a client claims the agents it serves; enqueue frames go to the
 * claiming connection, publish frames go to every other party.
 */

import { createConnection, createServer } from "node:net";
import type { Server, Socket } from "node:net";
import { chmod, rm } from "node:fs/promises";
import { dirname } from "node:path";
import { TransportError } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { ensureSecureDirectory } from "../utils/pathResolver.js";
import type { BusFrame, IMessageTransport } from "../teams/message-bus.js";
import { encodeFrame, FrameDecoder } from "./frame-codec.js";
import type { IDecodeResult } from "./frame-codec.js";

// ── Types ───────────────────────────────────────────────────────────────

export interface ISocketTransportOptions {
  readonly socketPath: string;
  readonly secret: string;
}

type FrameHandler = (frame: BusFrame) => void;

interface IConnection {
  readonly socket: Socket;
  readonly agents: Set<string>;
}

const SOCKET_PERMS = 0o600;

function writeFrame(socket: Socket, frame: BusFrame, secret: string): boolean {
  if (socket.destroyed) return false;
  socket.write(encodeFrame(frame, secret));
  return true;
}

/**
 * Feed socket data through a decoder. Rejected lines are logged; an
 * oversized frame closes the socket.
 */
function readFrames(socket: Socket, secret: string, onFrame: FrameHandler): void {
  const decoder = new FrameDecoder(secret);
  socket.on("data", (data: Buffer) => {
    let decoded: IDecodeResult;
    try {
      decoded = decoder.push(data);
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn({ error: reason }, "Closing connection after oversized frame");
      socket.destroy();
      return;
    }
    for (const error of decoded.errors) {
      logger.warn({ error }, "Rejected transport frame");
    }
    for (const frame of decoded.frames) {
      onFrame(frame);
    }
  });
}

// ── SocketBroker ────────────────────────────────────────────────────────

export class SocketBroker implements IMessageTransport {
  private readonly socketPath: string;
  private readonly secret: string;
  private readonly connections = new Set<IConnection>();
  private readonly owners = new Map<string, IConnection>();
  private readonly handlers = new Set<FrameHandler>();
  private server: Server | undefined;

  constructor(options: ISocketTransportOptions) {
    this.socketPath = options.socketPath;
    this.secret = options.secret;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  async listen(): Promise<void> {
    if (this.server) return;
    ensureSecureDirectory(dirname(this.socketPath));
    await rm(this.socketPath, { force: true });

    const server = createServer((socket) => {
      this.handleConnection(socket);
    });
    await new Promise<void>((resolve, reject) => {
      server.once("error", (error: Error) => {
        reject(new TransportError(`cannot listen on ${this.socketPath}: ${error.message}`));
      });
      server.listen(this.socketPath, () => {
        resolve();
      });
    });
    server.on("error", (error: Error) => {
      logger.error({ error: error.message }, "Socket broker error");
    });
    this.server = server;

    await chmod(this.socketPath, SOCKET_PERMS);
    logger.info({ socketPath: this.socketPath }, "Socket broker listening");
  }

  async send(frame: BusFrame): Promise<boolean> {
    switch (frame.kind) {
      case "publish": {
        let delivered = false;
        for (const connection of this.connections) {
          delivered = writeFrame(connection.socket, frame, this.secret) || delivered;
        }
        return delivered;
      }
      case "enqueue": {
        const owner = this.owners.get(frame.agentId);
        return owner ? writeFrame(owner.socket, frame, this.secret) : false;
      }
      case "claim":
        return false;
    }
  }

  onReceive(handler: FrameHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  owns(agentId: string): boolean {
    return this.owners.has(agentId);
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    for (const connection of this.connections) {
      connection.socket.destroy();
    }
    this.connections.clear();
    this.owners.clear();

    await new Promise<void>((resolve) => {
      server.close(() => {
        resolve();
      });
    });
    await rm(this.socketPath, { force: true });
    logger.info({ socketPath: this.socketPath }, "Socket broker closed");
  }

  private handleConnection(socket: Socket): void {
    const connection: IConnection = { socket, agents: new Set() };
    this.connections.add(connection);
    logger.debug({ connections: this.connections.size }, "Agent process connected");

    readFrames(socket, this.secret, (frame) => {
      this.route(connection, frame);
    });

    socket.on("close", () => {
      this.connections.delete(connection);
      for (const agentId of connection.agents) {
        if (this.owners.get(agentId) === connection) {
          this.owners.delete(agentId);
        }
      }
      logger.info({ agents: [...connection.agents] }, "Agent process disconnected");
    });
    socket.on("error", (error: Error) => {
      logger.warn({ error: error.message, agents: [...connection.agents] }, "Agent connection error");
    });
  }

  private route(from: IConnection, frame: BusFrame): void {
    switch (frame.kind) {
      case "claim":
        from.agents.add(frame.agentId);
        this.owners.set(frame.agentId, from);
        logger.info({ agentId: frame.agentId }, "Agent queue claimed by remote process");
        return;
      case "enqueue": {
        const owner = this.owners.get(frame.agentId);
        if (owner && owner !== from) {
          writeFrame(owner.socket, frame, this.secret);
          return;
        }
        break;
      }
      case "publish":
        for (const connection of this.connections) {
          if (connection !== from) writeFrame(connection.socket, frame, this.secret);
        }
        break;
    }
    for (const handler of this.handlers) {
      handler(frame);
    }
  }
}

// ── SocketClient ────────────────────────────────────────────────────────

export class SocketClient implements IMessageTransport {
  private readonly socketPath: string;
  private readonly secret: string;
  private readonly handlers = new Set<FrameHandler>();
  /** Agents whose queues live in this process. */
  private readonly local = new Set<string>();
  private socket: Socket | undefined;

  constructor(options: ISocketTransportOptions) {
    this.socketPath = options.socketPath;
    this.secret = options.secret;
  }

  get isConnected(): boolean {
    return this.socket !== undefined && !this.socket.destroyed;
  }

  async connect(): Promise<void> {
    if (this.socket) return;

    const socket = await new Promise<Socket>((resolve, reject) => {
      const candidate = createConnection(this.socketPath);
      candidate.once("error", (error: Error) => {
        reject(new TransportError(`cannot connect to ${this.socketPath}: ${error.message}`));
      });
      candidate.once("connect", () => {
        resolve(candidate);
      });
    });

    socket.on("error", (error: Error) => {
      logger.error({ error: error.message }, "Broker connection error");
    });
    socket.on("close", () => {
      this.socket = undefined;
      logger.warn({ socketPath: this.socketPath }, "Disconnected from broker");
    });
    readFrames(socket, this.secret, (frame) => {
      for (const handler of this.handlers) {
        handler(frame);
      }
    });

    this.socket = socket;
    logger.info({ socketPath: this.socketPath }, "Connected to broker");
  }

  async send(frame: BusFrame): Promise<boolean> {
    const socket = this.socket;
    if (!socket) {
      throw new TransportError("not connected to the broker");
    }
    if (frame.kind === "claim") {
      this.local.add(frame.agentId);
    }
    return writeFrame(socket, frame, this.secret);
  }

  onReceive(handler: FrameHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  owns(agentId: string): boolean {
    return !this.local.has(agentId);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = undefined;
    await new Promise<void>((resolve) => {
      socket.end(() => {
        resolve();
      });
    });
  }
}
