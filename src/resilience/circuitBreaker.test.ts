import { describe, expect, it, vi } from "vitest";
import { AbortedError, CircuitOpenError, UnknownIncidentError } from "../errors";
import { CircuitBreaker } from "./circuitBreaker";

function fakeClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

const fail = () => Promise.reject(new Error("query failed"));
const ok = () => Promise.resolve("ok");
const cancelled = () => Promise.reject(new AbortedError("recall"));
const neutral = { isNeutral: (err: unknown) => err instanceof AbortedError };

describe("CircuitBreaker", () => {
  it("opens after three consecutive failures", async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker("memory", { now: clock.now });

    for (let i = 0; i < 3; i++) {
      await expect(breaker.call(fail)).rejects.toThrow("query failed");
    }

    expect(breaker.state).toBe("OPEN");
    expect(breaker.snapshot().trips).toBe(1);
  });

  it("fails fast while open without invoking the call", async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker("memory", { now: clock.now });
    for (let i = 0; i < 3; i++) await breaker.call(fail).catch(() => undefined);

    const fn = vi.fn(ok);
    clock.advance(29_999);
    await expect(breaker.call(fn)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it("does not open when failures are spread beyond the window", async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker("memory", {
      now: clock.now,
      failureWindowMs: 1_000,
    });

    await breaker.call(fail).catch(() => undefined);
    await breaker.call(fail).catch(() => undefined);
    clock.advance(1_500);
    await breaker.call(fail).catch(() => undefined);

    expect(breaker.state).toBe("CLOSED");
    expect(breaker.snapshot().consecutiveFailures).toBe(1);
  });

  it("resets the failure count on success", async () => {
    const breaker = new CircuitBreaker("memory");
    await breaker.call(fail).catch(() => undefined);
    await breaker.call(fail).catch(() => undefined);
    await breaker.call(ok);
    await breaker.call(fail).catch(() => undefined);

    expect(breaker.state).toBe("CLOSED");
  });

  it("admits exactly one trial after the recovery timeout and closes on success", async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker("memory", { now: clock.now });
    for (let i = 0; i < 3; i++) await breaker.call(fail).catch(() => undefined);

    clock.advance(30_000);
    expect(breaker.state).toBe("HALF_OPEN");

    let release: (value: string) => void = () => undefined;
    const trial = breaker.call(
      () => new Promise<string>((resolve) => {
        release = resolve;
      }),
    );

    const concurrent = vi.fn(ok);
    await expect(breaker.call(concurrent)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(concurrent).not.toHaveBeenCalled();

    release("recovered");
    await expect(trial).resolves.toBe("recovered");
    expect(breaker.state).toBe("CLOSED");
  });

  it("reopens with a fresh timeout when the trial fails", async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker("memory", { now: clock.now });
    for (let i = 0; i < 3; i++) await breaker.call(fail).catch(() => undefined);

    clock.advance(30_000);
    await expect(breaker.call(fail)).rejects.toThrow("query failed");
    expect(breaker.state).toBe("OPEN");

    clock.advance(29_999);
    expect(breaker.state).toBe("OPEN");
    clock.advance(1);
    expect(breaker.state).toBe("HALF_OPEN");
    expect(breaker.snapshot().trips).toBe(2);
  });

  it("ignores errors excluded by shouldTrip", async () => {
    const breaker = new CircuitBreaker("memory", {
      shouldTrip: (err) => !(err instanceof UnknownIncidentError),
    });
    const unknown = () => Promise.reject(new UnknownIncidentError("inc_missing"));

    for (let i = 0; i < 5; i++) {
      await expect(breaker.call(unknown)).rejects.toBeInstanceOf(UnknownIncidentError);
    }
    expect(breaker.state).toBe("CLOSED");
  });

  it("keeps a cancelled trial from closing the circuit", async () => {
    const clock = fakeClock();
    const breaker = new CircuitBreaker("memory", { now: clock.now, ...neutral });
    for (let i = 0; i < 3; i++) await breaker.call(fail).catch(() => undefined);

    clock.advance(30_000);
    await expect(breaker.call(cancelled)).rejects.toBeInstanceOf(AbortedError);

    expect(breaker.state).toBe("HALF_OPEN");
    expect(breaker.snapshot().trialInFlight).toBe(false);

    await expect(breaker.call(fail)).rejects.toThrow("query failed");
    expect(breaker.state).toBe("OPEN");
    expect(breaker.snapshot().trips).toBe(2);
  });

  it("does not let a cancellation clear the failure count", async () => {
    const breaker = new CircuitBreaker("memory", neutral);

    await breaker.call(fail).catch(() => undefined);
    await breaker.call(fail).catch(() => undefined);
    await expect(breaker.call(cancelled)).rejects.toBeInstanceOf(AbortedError);
    expect(breaker.snapshot().consecutiveFailures).toBe(2);

    await breaker.call(fail).catch(() => undefined);
    expect(breaker.state).toBe("OPEN");
  });
});
