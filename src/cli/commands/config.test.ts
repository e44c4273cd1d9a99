import { describe, it, expect } from "vitest";
import { getNestedValue, redactConfig } from "./config.js";
import { DEFAULT_CONFIG } from "../../types/config.js";

describe("config command helpers", () => {
  it("masks the bus secret", () => {
    const config = { ...DEFAULT_CONFIG, transport: { socketPath: "/tmp/bus.sock", secret: "test-secret" } };
    expect(redactConfig(config).transport).toEqual({ socketPath: "/tmp/bus.sock", secret: "[REDACTED]" });
    expect(redactConfig(DEFAULT_CONFIG).transport.secret).toBeUndefined();
  });

  it("looks up dotted keys", () => {
    expect(getNestedValue(DEFAULT_CONFIG, "budget.premiumBelow")).toBe(0.8);
    expect(getNestedValue(DEFAULT_CONFIG, "tiers.local")).toEqual(["codellama"]);
    expect(getNestedValue(DEFAULT_CONFIG, "budget.missing")).toBeUndefined();
    expect(getNestedValue(DEFAULT_CONFIG, "budget.limitUsd.deeper")).toBeUndefined();
  });
});
