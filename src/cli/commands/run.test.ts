import { describe, it, expect } from "vitest";
import { parseContextPairs, parseRoster, preview } from "./run.js";
import { ValidationError } from "../../types/errors.js";

describe("parseContextPairs", () => {
  it("splits on the first '=' and reads @file values", () => {
    const files: Record<string, string> = { "bug.txt": "crash on empty input" };
    const context = parseContextPairs(["code=a = b", "bug_description=@bug.txt"], (path) => files[path] ?? "");

    expect(context).toEqual({ code: "a = b", bug_description: "crash on empty input" });
  });

  it("rejects pairs without a key", () => {
    expect(() => parseContextPairs(["=value"])).toThrow('Invalid context: "=value" is not key=value');
    expect(() => parseContextPairs(["novalue"])).toThrow(ValidationError);
  });
});

describe("parseRoster", () => {
  it("accepts agent descriptors and reports bad entries by path", () => {
    expect(parseRoster([{ role: "developer", capabilities: ["code"] }])).toEqual([
      { role: "developer", capabilities: ["code"] },
    ]);
    expect(() => parseRoster([{ role: "developer" }])).toThrow("Invalid agent roster: 0.capabilities: Required");
  });
});

describe("preview", () => {
  it("flattens whitespace and truncates long results", () => {
    expect(preview("line one\n\n  line two")).toBe("line one line two");
    expect(preview({ ok: true })).toBe('{"ok":true}');
    expect(preview("x".repeat(250))).toBe(`${"x".repeat(200)}...`);
  });
});
