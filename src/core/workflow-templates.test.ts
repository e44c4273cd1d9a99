import { describe, it, expect } from "vitest";
import { expandTemplate, loadTemplates, parseTemplates } from "./workflow-templates.js";
import { planWorkflow } from "./workflow-spec.js";
import { ValidationError } from "../types/errors.js";

describe("loadTemplates", () => {
  it("reads the bundled catalogue", async () => {
    const templates = await loadTemplates();
    expect([...templates.keys()]).toEqual([
      "simple_development",
      "code_review",
      "full_development_cycle",
      "architecture_design",
      "bug_fix",
      "refactoring",
    ]);
    expect(templates.get("bug_fix")?.requires).toEqual(["bug_description", "code"]);
  });

  it("expands every bundled template into a valid plan", async () => {
    const context = { code: "let x = 1", bug_description: "x is wrong", refactor_goals: "clarity" };
    for (const template of (await loadTemplates()).values()) {
      const plan = planWorkflow(expandTemplate(template, "ship it", context), { maxAttempts: 3 });
      expect(plan.tasks.length).toBeGreaterThan(0);
    }
  });
});

describe("parseTemplates", () => {
  it("rejects malformed entries with their path", () => {
    expect(() => parseTemplates("Broken:\n  mode: dag\n", "inline")).toThrow(ValidationError);
    expect(() => parseTemplates("demo:\n  description: d\n  mode: dag\n  tasks: []\n", "inline")).toThrow(
      "Invalid template catalogue inline: demo.tasks: template must contain at least one task",
    );
  });
});

describe("expandTemplate", () => {
  const templates = parseTemplates(
    [
      "fix:",
      "  description: fix a bug",
      "  mode: sequential",
      "  requires: [code]",
      "  tasks:",
      "    - id: fix",
      "      type: developer",
      '      description: "Fix {{ goal }} in {{module}}"',
      "      params:",
      '        context: "{{code}}"',
      '        notes: ["{{goal}}", 3]',
    ].join("\n"),
  );
  const template = templates.get("fix");

  it("fills placeholders in descriptions and params", () => {
    if (!template) throw new Error("template missing");
    expect(expandTemplate(template, "the crash", { code: "throw 1" })).toEqual({
      name: "fix: the crash",
      mode: "sequential",
      tasks: [
        {
          id: "fix",
          type: "developer",
          description: "Fix the crash in ",
          params: { context: "throw 1", notes: ["the crash", 3] },
        },
      ],
    });
  });

  it("requires the template's context keys", () => {
    if (!template) throw new Error("template missing");
    expect(() => expandTemplate(template, "the crash", { code: "  " })).toThrow(
      "Invalid context for template fix: code: required",
    );
  });
});
