/**
 * Per-provider circuit breaker.
 *
 * closed: calls allowed; `failureThreshold` consecutive failures open it.
 * open: calls rejected until `cooldownMs` elapses, then one trial is let through.
 * half_open: the trial is in flight; success closes, failure reopens with the
 * cooldown doubled up to `maxCooldownMs`.
 */

import type { ICircuitBreakerConfig } from "../types/config.js";
import type { CircuitState, IProviderHealth } from "../types/provider.js";
import { logger } from "../utils/index.js";

export class CircuitBreaker {
  readonly provider: string;
  private readonly config: ICircuitBreakerConfig;
  private readonly now: () => number;
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | undefined;
  private cooldownMs: number;

  constructor(provider: string, config: ICircuitBreakerConfig, now: () => number = Date.now) {
    this.provider = provider;
    this.config = config;
    this.now = now;
    this.cooldownMs = config.cooldownMs;
  }

  /**
   * Ask permission for one call. In the open state this admits exactly one
   * trial once the cooldown has elapsed.
   */
  tryAcquire(): boolean {
    switch (this.state) {
      case "closed":
        return true;
      case "half_open":
        return false;
      case "open": {
        const openedAt = this.openedAt ?? 0;
        if (this.now() - openedAt < this.cooldownMs) {
          return false;
        }
        this.state = "half_open";
        logger.info({ provider: this.provider }, "Circuit half-open, admitting trial call");
        return true;
      }
    }
  }

  recordSuccess(): void {
    if (this.state !== "closed") {
      logger.info({ provider: this.provider }, "Circuit closed");
    }
    this.state = "closed";
    this.consecutiveFailures = 0;
    this.openedAt = undefined;
    this.cooldownMs = this.config.cooldownMs;
  }

  recordFailure(): void {
    this.consecutiveFailures += 1;

    if (this.state === "half_open") {
      this.cooldownMs = Math.min(this.cooldownMs * 2, this.config.maxCooldownMs);
      this.open();
      return;
    }
    if (this.state === "closed" && this.consecutiveFailures >= this.config.failureThreshold) {
      this.open();
    }
  }

  /** Return an unfinished trial (caller cancelled) without counting it either way. */
  releaseTrial(): void {
    if (this.state === "half_open") {
      this.state = "open";
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getHealth(): IProviderHealth {
    return {
      provider: this.provider,
      consecutiveFailures: this.consecutiveFailures,
      circuitState: this.state,
      openedAt: this.openedAt !== undefined ? new Date(this.openedAt) : undefined,
      cooldownMs: this.cooldownMs,
    };
  }

  private open(): void {
    this.state = "open";
    this.openedAt = this.now();
    logger.warn(
      { provider: this.provider, failures: this.consecutiveFailures, cooldownMs: this.cooldownMs },
      "Circuit opened",
    );
  }
}
