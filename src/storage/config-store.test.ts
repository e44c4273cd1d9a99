import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigStore, checkConfig, mergeConfig } from "./config-store.js";
import { DEFAULT_CONFIG } from "../types/config.js";

describe("ConfigStore", () => {
  let dir: string;
  let globalPath: string;
  let projectRoot: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "crewline-config-"));
    globalPath = join(dir, "home", "config.json");
    projectRoot = join(dir, "project");
    mkdirSync(join(dir, "home"), { recursive: true });
    mkdirSync(join(projectRoot, ".crewline"), { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeProject(content: string): void {
    writeFileSync(join(projectRoot, ".crewline", "config.json"), content);
  }

  it("uses defaults when no file exists", () => {
    const store = new ConfigStore();
    expect(store.loadGlobal(globalPath)).toEqual(DEFAULT_CONFIG);
    expect(store.loadProject(projectRoot)).toEqual(DEFAULT_CONFIG);
  });

  it("merges project over global over defaults, field by field", () => {
    writeFileSync(
      globalPath,
      JSON.stringify({ budget: { limitUsd: 50 }, retry: { maxAttempts: 5 }, tiers: { local: ["qwen"] } }),
    );
    writeProject(JSON.stringify({ budget: { premiumBelow: 0.7 }, maxWorkflowHistory: 5 }));

    const store = new ConfigStore();
    store.loadGlobal(globalPath);
    const config = store.loadProject(projectRoot);

    expect(config.budget).toEqual({ ...DEFAULT_CONFIG.budget, limitUsd: 50, premiumBelow: 0.7 });
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.baseDelayMs).toBe(DEFAULT_CONFIG.retry.baseDelayMs);
    expect(config.tiers).toEqual({ ...DEFAULT_CONFIG.tiers, local: ["qwen"] });
    expect(config.maxWorkflowHistory).toBe(5);
  });

  it("fills provider defaults for new provider entries", () => {
    writeFileSync(globalPath, JSON.stringify({ providers: { qwen: { kind: "ollama", model: "qwen2.5-coder" } } }));

    const config = new ConfigStore().loadGlobal(globalPath);
    expect(config.providers["qwen"]).toEqual({
      kind: "ollama",
      model: "qwen2.5-coder",
      enabled: true,
      inputPricePerMToken: 0,
      outputPricePerMToken: 0,
    });
    expect(config.providers["claude-sonnet"]).toEqual(DEFAULT_CONFIG.providers["claude-sonnet"]);
  });

  it("ignores malformed, invalid and inconsistent files", () => {
    const store = new ConfigStore();

    writeFileSync(globalPath, "{ not json");
    expect(store.loadGlobal(globalPath)).toEqual(DEFAULT_CONFIG);

    writeFileSync(globalPath, JSON.stringify({ budget: { limitUsd: -5 } }));
    expect(store.loadGlobal(globalPath)).toEqual(DEFAULT_CONFIG);

    writeFileSync(globalPath, JSON.stringify({ budget: { premiumBelow: 0.99 } }));
    expect(store.loadGlobal(globalPath)).toEqual(DEFAULT_CONFIG);
  });

  it("drops a project layer that conflicts with the global one", () => {
    writeFileSync(globalPath, JSON.stringify({ budget: { premiumBelow: 0.5, localAbove: 0.6 } }));
    writeProject(JSON.stringify({ budget: { premiumBelow: 0.65 } }));

    const store = new ConfigStore();
    store.loadGlobal(globalPath);
    expect(store.loadProject(projectRoot).budget).toMatchObject({ premiumBelow: 0.5, localAbove: 0.6 });
  });

  it("saves the global layer with owner-only permissions", () => {
    const store = new ConfigStore();
    store.saveGlobal({ heartbeat: { timeoutMs: 120_000 } }, globalPath);

    expect(JSON.parse(readFileSync(globalPath, "utf-8"))).toEqual({ heartbeat: { timeoutMs: 120_000 } });
    expect(statSync(globalPath).mode & 0o777).toBe(0o600);
    expect(store.config.heartbeat).toEqual({ intervalMs: 30_000, timeoutMs: 120_000 });
  });
});

describe("checkConfig", () => {
  it("accepts the defaults and reports cross-field conflicts", () => {
    expect(checkConfig(DEFAULT_CONFIG)).toEqual([]);
    expect(
      checkConfig(mergeConfig(DEFAULT_CONFIG, { retry: { baseDelayMs: 10, maxDelayMs: 5 }, heartbeat: { intervalMs: 90_000 } })),
    ).toEqual([
      "retry.maxDelayMs must be at least retry.baseDelayMs",
      "heartbeat.timeoutMs must be greater than heartbeat.intervalMs",
    ]);
  });
});
