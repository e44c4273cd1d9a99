/**
 * WorkflowSpec validation and DAG planning.
 *
 * sequential: each task depends on the one before it
 * parallel:   no edges, plus an implicit join task depending on all others
 * dag:        edges exactly as given in `dependsOn`
 */

import { z } from "zod";
import type { IWorkflowSpec, WorkflowMode } from "../types/task.js";
import { ValidationError } from "../types/errors.js";

export const JOIN_TASK_KEY = "__join__";

// ── Schemas ───────────────────────────────────────────────────────────

export const TaskSpecSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1, "task id is required")
    .max(128)
    .regex(/^[^/\s]+$/, "task id must not contain '/' or whitespace"),
  type: z.string().trim().min(1, "task type is required"),
  description: z.string().trim().min(1, "task description is required"),
  requiredCapabilities: z.array(z.string().trim().min(1)).optional(),
  dependsOn: z.array(z.string()).optional(),
  critical: z.boolean().optional(),
  maxAttempts: z.number().int().min(1).max(100).optional(),
  params: z.record(z.unknown()).optional(),
});

export const WorkflowSpecSchema = z.object({
  name: z.string().trim().min(1).optional(),
  mode: z.enum(["sequential", "parallel", "dag"]),
  tasks: z.array(TaskSpecSchema).min(1, "workflow must contain at least one task"),
  timeoutMs: z.number().int().positive().optional(),
});

// ── Planned Graph ─────────────────────────────────────────────────────

export interface IPlannedTask {
  readonly key: string;
  readonly type: string;
  readonly description: string;
  readonly requiredCapabilities: readonly string[];
  readonly dependsOn: readonly string[];
  readonly critical: boolean;
  readonly maxAttempts: number;
  readonly params: Readonly<Record<string, unknown>>;
  readonly implicit: boolean;
}

export interface IWorkflowPlan {
  readonly name: string;
  readonly mode: WorkflowMode;
  readonly timeoutMs?: number | undefined;
  readonly tasks: readonly IPlannedTask[];
}

export interface IPlanDefaults {
  readonly maxAttempts: number;
}

/**
 * Parse an untrusted value as a WorkflowSpec. Throws ValidationError.
 */
export function parseWorkflowSpec(input: unknown): IWorkflowSpec {
  const parsed = WorkflowSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      "workflow spec",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "spec"}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Validate a spec and expand it into a task graph keyed by local task id.
 * Rejects duplicate ids, unknown or self dependencies, and cycles.
 */
export function planWorkflow(input: unknown, defaults: IPlanDefaults): IWorkflowPlan {
  const spec = parseWorkflowSpec(input);
  const issues: string[] = [];
  const keys = new Set<string>();

  for (const task of spec.tasks) {
    if (keys.has(task.id)) {
      issues.push(`tasks: duplicate task id "${task.id}"`);
    }
    if (task.id === JOIN_TASK_KEY) {
      issues.push(`tasks: "${JOIN_TASK_KEY}" is reserved`);
    }
    keys.add(task.id);
  }

  for (const task of spec.tasks) {
    for (const dep of task.dependsOn ?? []) {
      if (dep === task.id) {
        issues.push(`tasks.${task.id}: task cannot depend on itself`);
      } else if (!keys.has(dep)) {
        issues.push(`tasks.${task.id}: unknown dependency "${dep}"`);
      }
    }
    if (spec.mode === "parallel" && (task.dependsOn?.length ?? 0) > 0) {
      issues.push(`tasks.${task.id}: dependsOn is not allowed in parallel mode`);
    }
  }

  if (issues.length > 0) {
    throw new ValidationError("workflow spec", issues);
  }

  const tasks: IPlannedTask[] = spec.tasks.map((task, index) => {
    const declared = task.dependsOn ?? [];
    const previous = index > 0 ? spec.tasks[index - 1] : undefined;
    const dependsOn = spec.mode === "sequential" && previous && !declared.includes(previous.id)
      ? [...declared, previous.id]
      : [...declared];

    return {
      key: task.id,
      type: task.type,
      description: task.description,
      requiredCapabilities: task.requiredCapabilities ?? [],
      dependsOn,
      critical: task.critical ?? true,
      maxAttempts: task.maxAttempts ?? defaults.maxAttempts,
      params: task.params ?? {},
      implicit: false,
    };
  });

  if (spec.mode === "parallel") {
    tasks.push({
      key: JOIN_TASK_KEY,
      type: "join",
      description: "Wait for all parallel tasks",
      requiredCapabilities: [],
      dependsOn: tasks.map((task) => task.key),
      critical: true,
      maxAttempts: 1,
      params: {},
      implicit: true,
    });
  }

  const cycle = findCycle(tasks);
  if (cycle.length > 0) {
    throw new ValidationError("workflow spec", [`tasks: dependency cycle through ${cycle.join(", ")}`]);
  }

  return {
    name: spec.name ?? `${spec.mode} workflow`,
    mode: spec.mode,
    timeoutMs: spec.timeoutMs,
    tasks,
  };
}

/**
 * Kahn's algorithm. Returns the keys left over when no node has in-degree 0,
 * i.e. the members of (or downstream of) a cycle; empty for a DAG.
 */
export function findCycle(tasks: readonly IPlannedTask[]): string[] {
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const task of tasks) {
    inDegree.set(task.key, task.dependsOn.length);
    for (const dep of task.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(task.key);
      dependents.set(dep, list);
    }
  }

  const queue = tasks.filter((task) => task.dependsOn.length === 0).map((task) => task.key);
  let visited = 0;

  while (queue.length > 0) {
    const key = queue.shift();
    if (key === undefined) break;
    visited += 1;

    for (const dependent of dependents.get(key) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      if (remaining === 0) {
        queue.push(dependent);
      }
    }
  }

  if (visited === tasks.length) {
    return [];
  }
  return tasks.filter((task) => (inDegree.get(task.key) ?? 0) > 0).map((task) => task.key);
}
