/**
 * `crewline worker`: run one agent in this process, attached to a
 * coordinator started with `crewline run --listen`.
 */

import { randomUUID } from "node:crypto";
import { Command } from "commander";
import pc from "picocolors";
import { ProviderRouter } from "../../core/provider-router.js";
import { RemoteBudget } from "../../core/remote-budget.js";
import { createProviderRegistry } from "../../providers/registry.js";
import { AgentWorker, routeWith } from "../../teams/agent-worker.js";
import { InMemoryMessageBus } from "../../teams/message-bus.js";
import { SocketClient } from "../../transport/socket-transport.js";
import { ValidationError } from "../../types/errors.js";
import { logger } from "../../utils/logger.js";
import { loadConfig, requireSecret, resolveSocketPath } from "../runtime.js";

interface IWorkerOptions {
  readonly role: string;
  readonly capabilities: string;
  readonly id?: string | undefined;
  readonly name?: string | undefined;
  readonly prefer?: string | undefined;
  readonly projectRoot?: string | undefined;
}

export function splitList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    process.once("SIGINT", () => resolve("SIGINT"));
    process.once("SIGTERM", () => resolve("SIGTERM"));
  });
}

export function createWorkerCommand(): Command {
  return new Command("worker")
    .description("Run an agent that joins a coordinator over the socket transport")
    .requiredOption("--role <role>", "Agent role, e.g. developer")
    .requiredOption("--capabilities <list>", "Comma-separated capability tags")
    .option("--id <id>", "Agent id (default: random)")
    .option("--name <name>", "Display name")
    .option("--prefer <providers>", "Comma-separated providers to try first")
    .option("--project-root <path>", "Override project root detection")
    .action(async (options: IWorkerOptions) => {
      const capabilities = splitList(options.capabilities);
      if (capabilities.length === 0) {
        throw new ValidationError("worker options", ["--capabilities needs at least one tag"]);
      }

      const config = loadConfig(options.projectRoot);
      const client = new SocketClient({ socketPath: resolveSocketPath(config), secret: requireSecret(config) });
      await client.connect();

      const agentId = options.id ?? randomUUID();
      const bus = new InMemoryMessageBus({ transport: client });
      const budget = new RemoteBudget(bus, config.budget, { agentId });
      budget.start();
      const router = new ProviderRouter(createProviderRegistry(config.providers), budget, {
        tiers: config.tiers,
        circuitBreaker: config.circuitBreaker,
        callTimeoutMs: config.timeouts.providerCallMs,
      });

      const modelPreference = splitList(options.prefer);
      const worker = new AgentWorker(bus, {
        agentId,
        executor: routeWith(router, modelPreference),
        heartbeatIntervalMs: config.heartbeat.intervalMs,
        dequeueTimeoutMs: config.timeouts.dequeueMs,
        announce: { name: options.name, role: options.role, capabilities, modelPreference },
      });

      bus.claimAgent(agentId);
      worker.start();
      process.stdout.write(pc.green(`Agent ${agentId} (${options.role}) connected\n`));

      const signal = await waitForShutdown();
      logger.info({ agentId, signal }, "Worker shutting down");
      await worker.stop();
      await budget.stop();
      bus.destroy();
      await client.close();
    });
}
