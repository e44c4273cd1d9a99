/**
 * `crewline run`: submit a workflow from a spec file or a template and follow
 * it to completion with agents running in this process (and, with --listen,
 * agents connecting over the socket transport).
 */

import { readFileSync } from "node:fs";
import { Command } from "commander";
import pc from "picocolors";
import { z } from "zod";
import { Coordinator } from "../../core/coordinator.js";
import { expandTemplate, loadTemplates } from "../../core/workflow-templates.js";
import { SqlitePersistence } from "../../storage/sqlite-persistence.js";
import { SocketBroker } from "../../transport/socket-transport.js";
import type { Subscription } from "../../teams/message-bus.js";
import type { IAgentDescriptor } from "../../types/agent.js";
import { ValidationError } from "../../types/errors.js";
import type { ITaskStateChangedMessage } from "../../types/message.js";
import type { IWorkflowSnapshot, TaskState } from "../../types/task.js";
import { loadConfig, readDocument, requireSecret, resolveSocketPath } from "../runtime.js";

// ── Types ───────────────────────────────────────────────────────────────

export interface IRunOptions {
  readonly template?: string | undefined;
  readonly goal?: string | undefined;
  readonly context: string[];
  readonly agents?: string | undefined;
  readonly timeout?: string | undefined;
  readonly listen?: boolean | undefined;
  readonly workers: boolean;
  readonly projectRoot?: string | undefined;
}

// ── Defaults ────────────────────────────────────────────────────────────

export const DEFAULT_ROSTER: readonly IAgentDescriptor[] = [
  { id: "developer-1", role: "developer", capabilities: ["code", "design"] },
  { id: "reviewer-1", role: "reviewer", capabilities: ["review"] },
];

const RosterSchema = z.array(
  z.object({
    id: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    role: z.string().min(1),
    capabilities: z.array(z.string().min(1)),
    modelPreference: z.array(z.string().min(1)).optional(),
  }),
);

const RESULT_PREVIEW_CHARS = 200;

// ── Helpers ─────────────────────────────────────────────────────────────

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `key=value` flags. A value starting with `@` names a file
 * whose contents become the value.
 */
export function parseContextPairs(
  pairs: readonly string[],
  readFile: (path: string) => string = (path) => readFileSync(path, "utf-8"),
): Record<string, string> {
  const context: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf("=");
    if (index <= 0) {
      throw new ValidationError("context", [`"${pair}" is not key=value`]);
    }
    const key = pair.slice(0, index);
    const value = pair.slice(index + 1);
    context[key] = value.startsWith("@") ? readFile(value.slice(1)) : value;
  }
  return context;
}

export function parseRoster(document: unknown): IAgentDescriptor[] {
  const parsed = RosterSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError(
      "agent roster",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "roster"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

function colorState(state: TaskState): string {
  switch (state) {
    case "succeeded":
      return pc.green(state);
    case "failed":
      return pc.red(state);
    case "skipped":
      return pc.yellow(state);
    default:
      return pc.cyan(state);
  }
}

function localKey(taskId: string): string {
  return taskId.slice(taskId.indexOf("/") + 1);
}

export function preview(result: unknown): string {
  const text = typeof result === "string" ? result : JSON.stringify(result);
  if (text === undefined) return "";
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > RESULT_PREVIEW_CHARS ? `${flat.slice(0, RESULT_PREVIEW_CHARS)}...` : flat;
}

async function printProgress(events: Subscription<ITaskStateChangedMessage>): Promise<void> {
  for await (const event of events) {
    const detail = event.error ? pc.dim(` (${event.error.kind}: ${event.error.detail})`) : "";
    process.stdout.write(
      `${pc.dim(new Date().toISOString())} ${pc.bold(localKey(event.taskId))} ${event.oldState} -> ${colorState(event.newState)}${detail}\n`,
    );
  }
}

function printSummary(snapshot: IWorkflowSnapshot): void {
  const color = snapshot.state === "succeeded" ? pc.green : pc.red;
  process.stdout.write(`\n${pc.bold(snapshot.name)}: ${color(snapshot.state)}\n`);
  for (const task of snapshot.tasks) {
    if (task.implicit) continue;
    process.stdout.write(`  ${pc.bold(task.key)} ${colorState(task.state)} ${pc.dim(`attempts: ${task.attempt}`)}\n`);
    if (task.error) {
      process.stdout.write(`    ${pc.red(`${task.error.kind}: ${task.error.detail}`)}\n`);
    }
    if (task.state === "succeeded" && task.result !== undefined) {
      process.stdout.write(`    ${preview(task.result)}\n`);
    }
  }
}

async function resolveSpec(specPath: string | undefined, options: IRunOptions): Promise<unknown> {
  if (options.template !== undefined) {
    if (specPath !== undefined) {
      throw new ValidationError("run arguments", ["give either a spec file or --template, not both"]);
    }
    if (options.goal === undefined) {
      throw new ValidationError("run arguments", ["--template needs --goal"]);
    }
    const template = (await loadTemplates()).get(options.template);
    if (!template) {
      throw new ValidationError("run arguments", [`unknown template "${options.template}"`]);
    }
    return expandTemplate(template, options.goal, parseContextPairs(options.context));
  }
  if (specPath === undefined) {
    throw new ValidationError("run arguments", ["a spec file or --template is required"]);
  }
  return readDocument(specPath);
}

// ── Command ─────────────────────────────────────────────────────────────

export async function runWorkflow(specPath: string | undefined, options: IRunOptions): Promise<IWorkflowSnapshot> {
  const config = loadConfig(options.projectRoot);
  const spec = await resolveSpec(specPath, options);
  const roster = options.agents !== undefined ? parseRoster(await readDocument(options.agents)) : DEFAULT_ROSTER;
  const timeoutMs = options.timeout !== undefined ? Number.parseInt(options.timeout, 10) : undefined;

  let persistence: SqlitePersistence | undefined;
  if (config.persistence.enabled) {
    persistence = new SqlitePersistence();
    persistence.open(config.persistence.databasePath);
  }

  let broker: SocketBroker | undefined;
  if (options.listen === true) {
    broker = new SocketBroker({ socketPath: resolveSocketPath(config), secret: requireSecret(config) });
    await broker.listen();
    process.stdout.write(pc.dim(`Listening for agents on ${resolveSocketPath(config)}\n`));
  }

  const coordinator = new Coordinator({ config, transport: broker, persistence });
  if (options.workers) {
    for (const descriptor of roster) {
      coordinator.spawnWorker(descriptor);
    }
  }
  const printing = printProgress(coordinator.bus.subscribe("task.state_changed"));
  coordinator.start();

  try {
    const workflowId = coordinator.submitWorkflow(spec);
    process.stdout.write(pc.dim(`Workflow ${workflowId} submitted\n`));
    try {
      return await coordinator.waitForCompletion(workflowId, timeoutMs);
    } catch (error: unknown) {
      coordinator.cancelWorkflow(workflowId, "run timed out");
      throw error;
    }
  } finally {
    await coordinator.stop();
    await printing;
    await broker?.close();
    persistence?.close();
  }
}

export function createRunCommand(): Command {
  return new Command("run")
    .description("Run a workflow from a JSON/YAML spec file or a template")
    .argument("[spec]", "Path to a workflow spec (.json, .yaml)")
    .option("-t, --template <name>", "Expand a named template instead of reading a spec")
    .option("-g, --goal <text>", "Goal filled into the template")
    .option("-c, --context <key=value>", "Template context; @path reads a file (repeatable)", collect, [])
    .option("-a, --agents <file>", "JSON/YAML list of agent descriptors to run locally")
    .option("--timeout <ms>", "Give up waiting after this many milliseconds")
    .option("--listen", "Accept agents from other processes on the socket transport")
    .option("--no-workers", "Do not start local agents")
    .option("--project-root <path>", "Override project root detection")
    .action(async (specPath: string | undefined, options: IRunOptions) => {
      const snapshot = await runWorkflow(specPath, options);
      printSummary(snapshot);
      process.exitCode = snapshot.state === "succeeded" ? 0 : 1;
    });
}
