import { describe, it, expect, beforeEach } from "vitest";
import { CircuitBreaker } from "./circuit-breaker.js";

const CONFIG = { failureThreshold: 3, cooldownMs: 30_000, maxCooldownMs: 100_000 };

describe("CircuitBreaker", () => {
  let clock: number;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = 0;
    breaker = new CircuitBreaker("provider-a", CONFIG, () => clock);
  });

  function failTimes(count: number): void {
    for (let i = 0; i < count; i++) {
      expect(breaker.tryAcquire()).toBe(true);
      breaker.recordFailure();
    }
  }

  it("opens after the failure threshold of consecutive failures", () => {
    failTimes(2);
    expect(breaker.getState()).toBe("closed");
    failTimes(1);
    expect(breaker.getState()).toBe("open");
    expect(breaker.tryAcquire()).toBe(false);
  });

  it("resets the failure count on success", () => {
    failTimes(2);
    breaker.recordSuccess();
    failTimes(2);
    expect(breaker.getState()).toBe("closed");
    expect(breaker.getHealth().consecutiveFailures).toBe(2);
  });

  it("admits exactly one trial after the cooldown", () => {
    failTimes(3);
    clock = 29_999;
    expect(breaker.tryAcquire()).toBe(false);

    clock = 30_000;
    expect(breaker.tryAcquire()).toBe(true);
    expect(breaker.getState()).toBe("half_open");
    expect(breaker.tryAcquire()).toBe(false);
  });

  it("closes on a successful trial and restores the base cooldown", () => {
    failTimes(3);
    clock = 30_000;
    breaker.tryAcquire();
    breaker.recordSuccess();

    expect(breaker.getHealth()).toEqual({
      provider: "provider-a",
      consecutiveFailures: 0,
      circuitState: "closed",
      openedAt: undefined,
      cooldownMs: 30_000,
    });
  });

  it("reopens on a failed trial with the cooldown doubled up to the cap", () => {
    failTimes(3);

    clock = 30_000;
    breaker.tryAcquire();
    breaker.recordFailure();
    expect(breaker.getHealth()).toMatchObject({ circuitState: "open", cooldownMs: 60_000, openedAt: new Date(30_000) });

    clock = 89_999;
    expect(breaker.tryAcquire()).toBe(false);
    clock = 90_000;
    breaker.tryAcquire();
    breaker.recordFailure();
    expect(breaker.getHealth().cooldownMs).toBe(100_000);

    clock = 190_000;
    breaker.tryAcquire();
    breaker.recordFailure();
    expect(breaker.getHealth().cooldownMs).toBe(100_000);
  });

  it("returns a cancelled trial without counting it", () => {
    failTimes(3);
    clock = 30_000;
    breaker.tryAcquire();
    breaker.releaseTrial();

    expect(breaker.getState()).toBe("open");
    expect(breaker.tryAcquire()).toBe(true);
  });
});
