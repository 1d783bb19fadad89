import { AbortedError, UnknownIncidentError, ValidationError } from "../errors";
import { CircuitBreaker, type CircuitBreakerOptions } from "../resilience/circuitBreaker";
import type {
  ActionEffectiveness,
  IncidentNode,
  RecalledIncident,
  TelemetryEvent,
} from "../types";
import { getErrorMessage } from "../utils/helpers";
import { logger } from "../utils/logger";
import type { IncidentMemory, OutcomeReport, PendingRecall } from "./incidentMemory";

export type MemoryResult<T> =
  | { available: true; value: T }
  | { available: false; reason: string };

// A store that rejects a caller's mistake is still answering.
function isStoreFailure(err: unknown): boolean {
  return !(err instanceof UnknownIncidentError || err instanceof ValidationError);
}

// A cancelled call never finished, so it proves nothing about the store.
function isCancellation(err: unknown): boolean {
  return err instanceof AbortedError;
}

/**
 * Memory behind a circuit breaker. Never throws to the pipeline except on
 * cancellation: an open breaker or a failed query becomes an unavailable
 * result, which callers read as "no historical context".
 */
export class ResilientMemory {
  readonly breaker: CircuitBreaker;

  constructor(
    readonly memory: IncidentMemory,
    breakerOptions: Partial<CircuitBreakerOptions> = {},
  ) {
    this.breaker = new CircuitBreaker("incident-memory", {
      ...breakerOptions,
      shouldTrip: isStoreFailure,
      isNeutral: isCancellation,
    });
  }

  recall(
    event: TelemetryEvent,
    k: number,
    signal?: AbortSignal,
  ): Promise<MemoryResult<RecalledIncident[]>> {
    return this.guard("recall", () => this.memory.recall(event, k, signal));
  }

  search(
    event: TelemetryEvent,
    k: number,
    signal?: AbortSignal,
  ): Promise<MemoryResult<PendingRecall>> {
    return this.guard("search", () => this.memory.search(event, k, signal));
  }

  /** Commit a search made through this memory */
  remember(pending: PendingRecall): Promise<MemoryResult<IncidentNode>> {
    return this.guard("remember", () => pending.commit());
  }

  storeOutcome(report: OutcomeReport): Promise<MemoryResult<string>> {
    return this.guard("storeOutcome", () => this.memory.storeOutcome(report));
  }

  mostEffectiveActions(
    component: string,
    k: number,
  ): Promise<MemoryResult<ActionEffectiveness[]>> {
    return this.guard("mostEffectiveActions", () =>
      this.memory.mostEffectiveActions(component, k),
    );
  }

  private async guard<T>(
    operation: string,
    fn: () => Promise<T>,
  ): Promise<MemoryResult<T>> {
    try {
      return { available: true, value: await this.breaker.call(fn) };
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      const reason = getErrorMessage(err);
      logger.warn("Incident memory unavailable", {
        Operation: operation,
        Reason: reason,
        Circuit: this.breaker.state,
      });
      return { available: false, reason };
    }
  }
}
