/**
 * Workflow templates: named task blueprints read from a YAML catalogue and
 * expanded into WorkflowSpecs by filling `{{placeholder}}` slots.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { ValidationError } from "../types/errors.js";
import type { IWorkflowSpec } from "../types/task.js";
import { TaskSpecSchema } from "./workflow-spec.js";

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL("../../templates/workflows.yaml", import.meta.url));

const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

// ── Zod Schema ──────────────────────────────────────────────────────────

const TemplateSchema = z.object({
  description: z.string().min(1),
  mode: z.enum(["sequential", "parallel", "dag"]),
  requires: z.array(z.string().min(1)).default([]),
  tasks: z.array(TaskSpecSchema).min(1, "template must contain at least one task"),
});

const CatalogueSchema = z.record(z.string().regex(/^[a-z][a-z0-9_]*$/, "template names are snake_case"), TemplateSchema);

export interface IWorkflowTemplate {
  readonly name: string;
  readonly description: string;
  readonly mode: IWorkflowSpec["mode"];
  /** Context keys that must be supplied on expansion. */
  readonly requires: readonly string[];
  readonly tasks: IWorkflowSpec["tasks"];
}

// ── Loading ─────────────────────────────────────────────────────────────

export function parseTemplates(raw: string, source = "templates"): Map<string, IWorkflowTemplate> {
  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`template catalogue ${source}`, [reason]);
  }

  const parsed = CatalogueSchema.safeParse(document);
  if (!parsed.success) {
    throw new ValidationError(
      `template catalogue ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "catalogue"}: ${issue.message}`),
    );
  }

  const templates = new Map<string, IWorkflowTemplate>();
  for (const [name, template] of Object.entries(parsed.data)) {
    templates.set(name, { name, ...template });
  }
  return templates;
}

export async function loadTemplates(filePath: string = DEFAULT_TEMPLATES_PATH): Promise<Map<string, IWorkflowTemplate>> {
  const raw = await readFile(filePath, "utf-8");
  const templates = parseTemplates(raw, filePath);
  logger.debug({ path: filePath, count: templates.size }, "Workflow templates loaded");
  return templates;
}

// ── Expansion ───────────────────────────────────────────────────────────

/**
 * Build a WorkflowSpec from a template. `goal` fills `{{goal}}`; every other
 * placeholder comes from `context`, and a placeholder with no value becomes "".
 */
export function expandTemplate(
  template: IWorkflowTemplate,
  goal: string,
  context: Readonly<Record<string, string>> = {},
): IWorkflowSpec {
  const missing = template.requires.filter((key) => (context[key] ?? "").trim().length === 0);
  if (missing.length > 0) {
    throw new ValidationError(
      `context for template ${template.name}`,
      missing.map((key) => `${key}: required`),
    );
  }

  const values: Record<string, string> = { ...context, goal };
  return {
    name: `${template.name}: ${goal}`,
    mode: template.mode,
    tasks: template.tasks.map((task) => ({
      ...task,
      description: fill(task.description, values),
      params: task.params === undefined ? undefined : fillRecord(task.params, values),
    })),
  };
}

function fill(text: string, values: Readonly<Record<string, string>>): string {
  return text.replace(PLACEHOLDER, (_match, key: string) => values[key] ?? "");
}

function fillValue(value: unknown, values: Readonly<Record<string, string>>): unknown {
  if (typeof value === "string") return fill(value, values);
  if (Array.isArray(value)) return value.map((item: unknown) => fillValue(item, values));
  if (value !== null && typeof value === "object") return fillRecord(value, values);
  return value;
}

function fillRecord(record: object, values: Readonly<Record<string, string>>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, fillValue(value, values)]));
}
