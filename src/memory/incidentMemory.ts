/**
 * Incident-outcome memory: a small graph of incidents linked to the
 * outcomes that resolved them, with nearest-neighbour recall over
 * incident embeddings.
 *
 * Every read-modify-write section runs under one mutex per instance.
 * Searching and storing are separate steps, so a caller that gives up
 * between them leaves nothing behind.
 * Embeddings are computed before taking the lock so a slow provider does
 * not block unrelated recalls.
 */

import { createHash } from "crypto";
import { MemoryUnavailableError, UnknownIncidentError, ValidationError } from "../errors";
import type {
  ActionEffectiveness,
  IncidentNode,
  OutcomeNode,
  RecalledIncident,
  ResolvedByEdge,
  TelemetryEvent,
} from "../types";
import { round, throwIfAborted } from "../utils/helpers";
import { LRUMap } from "../utils/lru";
import { Mutex } from "../utils/mutex";
import type { EmbeddingProvider } from "./embedding";

export type IncidentMemoryConfig = {
  maxIncidents: number;
  outcomeBucketSeconds: number;
  now: () => number;
};

export const DEFAULT_MEMORY_CONFIG: IncidentMemoryConfig = {
  maxIncidents: 1000,
  outcomeBucketSeconds: 60,
  now: () => Date.now(),
};

export type OutcomeReport = {
  incidentId: string;
  actions: readonly string[];
  success: boolean;
  durationMinutes: number;
  lessons?: string | null;
};

export type MemoryStats = {
  incidents: number;
  outcomes: number;
  edges: number;
  evictions: number;
  searches: number;
};

/** Recall results for an event whose incident is not stored yet */
export type PendingRecall = {
  incidentId: string;
  incidents: RecalledIncident[];
  /** Store the event's incident unless it is already stored, and touch the hits */
  commit(): Promise<IncidentNode>;
};

export function incidentIdFor(fingerprint: string): string {
  return `inc_${fingerprint.slice(0, 16)}`;
}

function euclidean(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Math.sqrt(sum);
}

export class IncidentMemory {
  private readonly config: IncidentMemoryConfig;
  private readonly incidents: LRUMap<string, IncidentNode>;
  private readonly outcomes = new Map<string, OutcomeNode>();
  private readonly edges = new Map<string, ResolvedByEdge[]>();
  // Insertions in flight, so outcome storage never races ahead of them
  private readonly pending = new Map<string, Promise<void>>();
  private readonly mutex = new Mutex();
  private evictions = 0;
  private searches = 0;

  constructor(
    private readonly embedder: EmbeddingProvider,
    config: Partial<IncidentMemoryConfig> = {},
  ) {
    this.config = { ...DEFAULT_MEMORY_CONFIG, ...config };
    this.incidents = new LRUMap(this.config.maxIncidents, (incidentId) =>
      this.dropIncident(incidentId),
    );
  }

  /**
   * Upsert the event's incident and return up to k nearest stored
   * incidents by ascending distance, newest first on ties. An incident
   * created by this call is not part of its own results.
   */
  async recall(
    event: TelemetryEvent,
    k: number,
    signal?: AbortSignal,
  ): Promise<RecalledIncident[]> {
    const incidentId = incidentIdFor(event.fingerprint);
    return this.track(
      incidentId,
      this.search(event, k, signal).then(async (pending) => {
        await pending.commit();
        return pending.incidents;
      }),
    );
  }

  /**
   * The same search as recall, leaving the store untouched until the
   * returned recall is committed.
   */
  async search(
    event: TelemetryEvent,
    k: number,
    signal?: AbortSignal,
  ): Promise<PendingRecall> {
    const incidentId = incidentIdFor(event.fingerprint);
    const known = this.incidents.peek(incidentId);
    const embedding = known ? known.embedding : await this.embed(event);

    const incidents = await this.mutex.runExclusive(() => {
      throwIfAborted(signal, "recall");
      this.searches++;
      return this.nearest(embedding, k);
    });

    return {
      incidentId,
      incidents,
      commit: () =>
        this.track(
          incidentId,
          this.mutex.runExclusive(() => {
            let node = this.incidents.get(incidentId);
            if (!node) {
              node = Object.freeze({
                incidentId,
                event,
                embedding: Object.freeze([...embedding]),
                createdAt: this.config.now(),
              });
              this.incidents.set(incidentId, node);
            }
            // A recall hit counts as an access for eviction.
            for (const hit of incidents) this.incidents.get(hit.incident.incidentId);
            return node;
          }),
        ),
    };
  }

  /**
   * Attach an outcome to an incident. Identical reports within one time
   * bucket return the id of the outcome already stored.
   */
  async storeOutcome(report: OutcomeReport): Promise<string> {
    const { incidentId, actions, success, durationMinutes } = report;
    if (!Number.isFinite(durationMinutes) || durationMinutes < 0) {
      throw new ValidationError("durationMinutes", "must be a non-negative number");
    }

    await this.pending.get(incidentId);

    return this.mutex.runExclusive(() => {
      if (!this.incidents.get(incidentId)) {
        throw new UnknownIncidentError(incidentId);
      }

      const sortedActions = [...actions].sort();
      const recordedAt = this.config.now();
      const bucket = Math.floor(recordedAt / (this.config.outcomeBucketSeconds * 1000));
      const outcomeId = `out_${createHash("sha256")
        .update(JSON.stringify([incidentId, sortedActions, bucket]))
        .digest("hex")
        .slice(0, 16)}`;

      if (this.outcomes.has(outcomeId)) return outcomeId;

      this.outcomes.set(
        outcomeId,
        Object.freeze({
          outcomeId,
          incidentId,
          actions: Object.freeze(sortedActions),
          success,
          durationMinutes,
          lessons: report.lessons ?? null,
          recordedAt,
        }),
      );
      const edges = this.edges.get(incidentId) ?? [];
      edges.push(Object.freeze({ from: incidentId, to: outcomeId, type: "resolved-by" }));
      this.edges.set(incidentId, edges);

      return outcomeId;
    });
  }

  /** Actions on a component ranked by success rate, then attempts, then name */
  async mostEffectiveActions(
    component: string,
    k: number,
  ): Promise<ActionEffectiveness[]> {
    return this.mutex.runExclusive(() => {
      const tally = new Map<string, { successes: number; attempts: number }>();

      for (const incident of this.incidents.values()) {
        if (incident.event.component !== component) continue;
        for (const outcome of this.outcomesOf(incident.incidentId)) {
          for (const action of new Set(outcome.actions)) {
            const entry = tally.get(action) ?? { successes: 0, attempts: 0 };
            entry.attempts++;
            if (outcome.success) entry.successes++;
            tally.set(action, entry);
          }
        }
      }

      return [...tally.entries()]
        .map(([action, { successes, attempts }]) => ({
          action,
          successRate: round(successes / attempts),
          attempts,
        }))
        .sort(
          (a, b) =>
            b.successRate - a.successRate ||
            b.attempts - a.attempts ||
            a.action.localeCompare(b.action),
        )
        .slice(0, Math.max(0, k));
    });
  }

  getIncident(incidentId: string): IncidentNode | undefined {
    return this.incidents.peek(incidentId);
  }

  outcomesOf(incidentId: string): OutcomeNode[] {
    const edges = this.edges.get(incidentId) ?? [];
    return edges.flatMap((edge) => {
      const outcome = this.outcomes.get(edge.to);
      return outcome ? [outcome] : [];
    });
  }

  stats(): MemoryStats {
    let edges = 0;
    for (const list of this.edges.values()) edges += list.length;
    return {
      incidents: this.incidents.size,
      outcomes: this.outcomes.size,
      edges,
      evictions: this.evictions,
      searches: this.searches,
    };
  }

  // Outcome storage for this incident waits until the work settles.
  private async track<T>(incidentId: string, work: Promise<T>): Promise<T> {
    const settled = work.then(
      () => undefined,
      () => undefined,
    );
    this.pending.set(incidentId, settled);

    try {
      return await work;
    } finally {
      if (this.pending.get(incidentId) === settled) {
        this.pending.delete(incidentId);
      }
    }
  }

  private nearest(query: readonly number[], k: number): RecalledIncident[] {
    return [...this.incidents.values()]
      .map((candidate) => ({
        incident: candidate,
        distance: euclidean(query, candidate.embedding),
      }))
      .sort(
        (a, b) =>
          a.distance - b.distance ||
          b.incident.createdAt - a.incident.createdAt ||
          a.incident.incidentId.localeCompare(b.incident.incidentId),
      )
      .slice(0, Math.max(0, k))
      .map(({ incident, distance }) =>
        Object.freeze({
          incident,
          outcomes: Object.freeze(this.outcomesOf(incident.incidentId)),
          distance: round(distance, 6),
          similarity: round(1 / (1 + distance), 6),
        }),
      );
  }

  private async embed(event: TelemetryEvent): Promise<number[]> {
    const vector = await this.embedder.embed(event);
    if (vector.length !== this.embedder.dimensions) {
      throw new MemoryUnavailableError(
        `embedding has ${vector.length} dimensions, expected ${this.embedder.dimensions}`,
      );
    }
    if (!vector.every(Number.isFinite)) {
      throw new MemoryUnavailableError("embedding contains non-finite values");
    }
    return vector;
  }

  private dropIncident(incidentId: string): void {
    for (const edge of this.edges.get(incidentId) ?? []) {
      this.outcomes.delete(edge.to);
    }
    this.edges.delete(incidentId);
    this.evictions++;
  }
}
