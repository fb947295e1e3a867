/**
 * Circuit breaker for backend calls.
 *
 * closed: calls go through, consecutive failures are counted.
 * open: calls are refused until the recovery window has passed.
 * half-open: one trial call goes through; success closes the circuit,
 * failure opens it again.
 */

import { createLogger } from "../../utils/logger.js";

const log = createLogger("circuit-breaker");

export type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit. Default 5. */
  failureThreshold?: number;
  /** How long the circuit stays open before a trial call. Default 30s. */
  recoveryTimeoutMs?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly now: () => number;
  private failures = 0;
  private openedAt = 0;
  private trialInFlight = false;
  private current: CircuitState = "closed";

  constructor(opts: CircuitBreakerOptions = {}) {
    this.failureThreshold = Math.max(1, opts.failureThreshold ?? 5);
    this.recoveryTimeoutMs = opts.recoveryTimeoutMs ?? 30_000;
    this.now = opts.now ?? (() => Date.now());
  }

  get state(): CircuitState {
    if (this.current === "open" && this.now() - this.openedAt >= this.recoveryTimeoutMs) {
      return "half-open";
    }
    return this.current;
  }

  get failureCount(): number {
    return this.failures;
  }

  /** Milliseconds until a trial call is allowed; 0 when not open. */
  retryInMs(): number {
    if (this.current !== "open") return 0;
    return Math.max(0, this.openedAt + this.recoveryTimeoutMs - this.now());
  }

  /**
   * Whether a call may go out now. In half-open only the first caller
   * gets through until that trial settles.
   */
  tryAcquire(): boolean {
    const state = this.state;
    if (state === "closed") return true;
    if (state === "open") return false;
    if (this.trialInFlight) return false;
    this.current = "half-open";
    this.trialInFlight = true;
    log.info("circuit half-open, sending trial call");
    return true;
  }

  recordSuccess(): void {
    if (this.current !== "closed") log.info("circuit closed");
    this.failures = 0;
    this.trialInFlight = false;
    this.current = "closed";
  }

  recordFailure(): void {
    this.failures++;
    this.trialInFlight = false;
    if (this.current === "half-open" || this.failures >= this.failureThreshold) {
      if (this.current !== "open") {
        log.warn({ failures: this.failures }, "circuit opened");
      }
      this.current = "open";
      this.openedAt = this.now();
    }
  }
}
