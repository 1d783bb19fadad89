/**
 * Circuit breaker
 *
 * CLOSED → (failureThreshold consecutive failures within failureWindowMs) → OPEN
 * OPEN → (recoveryTimeoutMs elapsed) → HALF_OPEN
 * HALF_OPEN → (single trial succeeds) → CLOSED
 * HALF_OPEN → (trial fails) → OPEN, with a fresh timeout
 *
 * A neutral error, such as a cancelled call, changes nothing except to
 * free the trial slot it held.
 *
 * State transitions are synchronous, so a call never observes a
 * half-applied transition.
 */

import { CircuitOpenError } from "../errors";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export type CircuitBreakerOptions = {
  failureThreshold: number;
  failureWindowMs: number;
  recoveryTimeoutMs: number;
  /** Errors for which this returns false count as successes of the resource */
  shouldTrip: (err: unknown) => boolean;
  /** Errors for which this returns true are counted neither way */
  isNeutral: (err: unknown) => boolean;
  now: () => number;
};

export type CircuitSnapshot = Readonly<{
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  openedAt: number | null;
  trialInFlight: boolean;
  trips: number;
}>;

export const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 3,
  failureWindowMs: 60_000,
  recoveryTimeoutMs: 30_000,
  shouldTrip: () => true,
  isNeutral: () => false,
  now: () => Date.now(),
};

export class CircuitBreaker {
  private readonly options: CircuitBreakerOptions;
  private current: CircuitState = "CLOSED";
  // Timestamps of failures since the last success
  private failures: number[] = [];
  private openedAt: number | null = null;
  private trialInFlight = false;
  private trips = 0;

  constructor(
    readonly name: string,
    options: Partial<CircuitBreakerOptions> = {},
  ) {
    this.options = { ...DEFAULT_CIRCUIT_OPTIONS, ...options };
  }

  /** Current state, moving OPEN to HALF_OPEN once the recovery timeout has passed */
  get state(): CircuitState {
    if (
      this.current === "OPEN" &&
      this.openedAt !== null &&
      this.options.now() >= this.openedAt + this.options.recoveryTimeoutMs
    ) {
      this.current = "HALF_OPEN";
      this.trialInFlight = false;
    }
    return this.current;
  }

  /**
   * Run fn through the breaker. Rejects with CircuitOpenError without
   * invoking fn while OPEN, or while a HALF_OPEN trial is in flight.
   */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    const state = this.state;
    if (state === "OPEN" || (state === "HALF_OPEN" && this.trialInFlight)) {
      throw new CircuitOpenError(this.name);
    }

    const isTrial = state === "HALF_OPEN";
    if (isTrial) this.trialInFlight = true;

    try {
      const value = await fn();
      this.recordSuccess();
      return value;
    } catch (err) {
      if (this.options.isNeutral(err)) throw err;
      if (this.options.shouldTrip(err)) {
        this.recordFailure();
      } else {
        this.recordSuccess();
      }
      throw err;
    } finally {
      if (isTrial) this.trialInFlight = false;
    }
  }

  recordSuccess(): void {
    this.failures = [];
    if (this.current !== "CLOSED") {
      this.current = "CLOSED";
      this.openedAt = null;
    }
  }

  recordFailure(): void {
    const now = this.options.now();

    if (this.state === "HALF_OPEN") {
      this.open(now);
      return;
    }

    const windowStart = now - this.options.failureWindowMs;
    this.failures = this.failures.filter((t) => t >= windowStart);
    this.failures.push(now);

    if (this.current === "CLOSED" && this.failures.length >= this.options.failureThreshold) {
      this.open(now);
    }
  }

  reset(): void {
    this.current = "CLOSED";
    this.failures = [];
    this.openedAt = null;
    this.trialInFlight = false;
  }

  snapshot(): CircuitSnapshot {
    const state = this.state;
    return Object.freeze({
      name: this.name,
      state,
      consecutiveFailures: this.failures.length,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight,
      trips: this.trips,
    });
  }

  private open(now: number): void {
    this.current = "OPEN";
    this.openedAt = now;
    this.failures = [];
    this.trips++;
  }
}
