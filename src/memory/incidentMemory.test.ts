import { describe, expect, it } from "vitest";
import { AbortedError, MemoryUnavailableError, UnknownIncidentError } from "../errors";
import type { TelemetryEvent } from "../types";
import { validateEvent } from "../validation/eventValidator";
import type { EmbeddingProvider } from "./embedding";
import { IncidentMemory, incidentIdFor } from "./incidentMemory";

/** Embeds latency and throughput as-is, optionally after a delay */
class PlainEmbedding implements EmbeddingProvider {
  readonly dimensions = 2;
  calls = 0;

  constructor(private readonly delayMs = 0) {}

  async embed(event: TelemetryEvent): Promise<number[]> {
    this.calls++;
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    return [event.latencyP99, event.throughput];
  }
}

function clock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

function event(latency: number, component = "api-service"): TelemetryEvent {
  return validateEvent({
    component,
    latency_p99: latency,
    error_rate: 0.02,
    throughput: 100,
  });
}

describe("IncidentMemory.recall", () => {
  it("creates the incident on first sight without returning it", async () => {
    const memory = new IncidentMemory(new PlainEmbedding());
    const results = await memory.recall(event(100), 5);

    expect(results).toEqual([]);
    expect(memory.stats().incidents).toBe(1);
  });

  it("reuses the incident for a repeated fingerprint and returns it at distance zero", async () => {
    const embedder = new PlainEmbedding();
    const memory = new IncidentMemory(embedder);
    const first = event(100);

    await memory.recall(first, 5);
    const results = await memory.recall(event(100), 5);

    expect(memory.stats().incidents).toBe(1);
    expect(embedder.calls).toBe(1);
    expect(results).toHaveLength(1);
    expect(results[0]?.incident.incidentId).toBe(incidentIdFor(first.fingerprint));
    expect(results[0]?.distance).toBe(0);
    expect(results[0]?.similarity).toBe(1);
  });

  it("orders by ascending distance", async () => {
    const memory = new IncidentMemory(new PlainEmbedding());
    const a = event(100);
    const b = event(200);
    const c = event(300);
    for (const e of [a, b, c]) await memory.recall(e, 5);

    const results = await memory.recall(event(210), 2);
    expect(results.map((r) => r.incident.incidentId)).toEqual([
      incidentIdFor(b.fingerprint),
      incidentIdFor(c.fingerprint),
    ]);
    expect(results[0]?.distance).toBe(10);
  });

  it("breaks distance ties in favour of the newer incident", async () => {
    const time = clock();
    const memory = new IncidentMemory(new PlainEmbedding(), { now: time.now });
    const older = event(100);
    const newer = event(300);

    await memory.recall(older, 5);
    time.advance(1_000);
    await memory.recall(newer, 5);

    const results = await memory.recall(event(200), 2);
    expect(results.map((r) => r.incident.incidentId)).toEqual([
      incidentIdFor(newer.fingerprint),
      incidentIdFor(older.fingerprint),
    ]);
  });

  it("treats an embedding of the wrong size as a memory failure", async () => {
    const memory = new IncidentMemory({
      dimensions: 3,
      embed: async () => [1, 2],
    });

    await expect(memory.recall(event(100), 5)).rejects.toBeInstanceOf(
      MemoryUnavailableError,
    );
    expect(memory.stats().incidents).toBe(0);
  });

  it("does not insert when cancelled", async () => {
    const memory = new IncidentMemory(new PlainEmbedding());
    const controller = new AbortController();
    controller.abort();

    await expect(
      memory.recall(event(100), 5, controller.signal),
    ).rejects.toBeInstanceOf(AbortedError);
    expect(memory.stats().incidents).toBe(0);
  });
});

describe("IncidentMemory.search", () => {
  it("stores nothing until the search is committed", async () => {
    const memory = new IncidentMemory(new PlainEmbedding());
    await memory.recall(event(100), 5);

    const pending = await memory.search(event(120), 5);
    expect(pending.incidents.map((r) => r.distance)).toEqual([20]);
    expect(memory.stats().incidents).toBe(1);

    const node = await pending.commit();
    expect(node.incidentId).toBe(pending.incidentId);
    expect(memory.stats().incidents).toBe(2);

    await pending.commit();
    expect(memory.stats().incidents).toBe(2);
  });
});

describe("IncidentMemory.storeOutcome", () => {
  it("is idempotent within a time bucket", async () => {
    const time = clock();
    const memory = new IncidentMemory(new PlainEmbedding(), { now: time.now });
    const incident = event(320);
    const incidentId = incidentIdFor(incident.fingerprint);
    await memory.recall(incident, 5);

    const first = await memory.storeOutcome({
      incidentId,
      actions: ["restart_container", "alert_team"],
      success: true,
      durationMinutes: 4,
    });
    const repeat = await memory.storeOutcome({
      incidentId,
      actions: ["alert_team", "restart_container"],
      success: true,
      durationMinutes: 4,
    });

    expect(repeat).toBe(first);
    expect(first).toMatch(/^out_[0-9a-f]{16}$/);
    expect(memory.stats()).toMatchObject({ incidents: 1, outcomes: 1, edges: 1 });

    time.advance(60_000);
    const later = await memory.storeOutcome({
      incidentId,
      actions: ["restart_container", "alert_team"],
      success: false,
      durationMinutes: 9,
    });
    expect(later).not.toBe(first);
    expect(memory.outcomesOf(incidentId).map((o) => o.success)).toEqual([true, false]);
    expect(memory.stats().incidents).toBe(1);
  });

  it("rejects outcomes for unknown incidents", async () => {
    const memory = new IncidentMemory(new PlainEmbedding());

    await expect(
      memory.storeOutcome({
        incidentId: "inc_0000000000000000",
        actions: ["restart_container"],
        success: true,
        durationMinutes: 1,
      }),
    ).rejects.toBeInstanceOf(UnknownIncidentError);
    expect(memory.stats().incidents).toBe(0);
  });

  it("waits for an in-flight insertion of the same incident", async () => {
    const memory = new IncidentMemory(new PlainEmbedding(20));
    const incident = event(320);

    const recall = memory.recall(incident, 5);
    const store = memory.storeOutcome({
      incidentId: incidentIdFor(incident.fingerprint),
      actions: ["scale_out"],
      success: true,
      durationMinutes: 2,
    });

    await expect(Promise.all([recall, store])).resolves.toHaveLength(2);
    expect(memory.stats().outcomes).toBe(1);
  });
});

describe("IncidentMemory eviction", () => {
  it("evicts the least recently accessed incident with its outcomes", async () => {
    const memory = new IncidentMemory(new PlainEmbedding(), { maxIncidents: 2 });
    const a = event(100);
    const b = event(200);
    const c = event(300);
    const bId = incidentIdFor(b.fingerprint);

    await memory.recall(a, 1);
    await memory.recall(b, 1);
    await memory.storeOutcome({
      incidentId: bId,
      actions: ["restart_container"],
      success: true,
      durationMinutes: 3,
    });
    // Touch a so that b becomes the eviction candidate.
    await memory.recall(a, 1);
    await memory.recall(c, 1);

    expect(memory.getIncident(bId)).toBeUndefined();
    expect(memory.stats()).toMatchObject({
      incidents: 2,
      outcomes: 0,
      edges: 0,
      evictions: 1,
    });

    const results = await memory.recall(event(210), 5);
    expect(results.map((r) => r.incident.incidentId)).not.toContain(bId);
  });
});

describe("IncidentMemory.mostEffectiveActions", () => {
  it("ranks by success rate, then attempts, then name", async () => {
    const time = clock();
    const memory = new IncidentMemory(new PlainEmbedding(), { now: time.now });
    const first = event(300);
    const second = event(400);
    await memory.recall(first, 1);
    await memory.recall(second, 1);

    const store = async (
      target: TelemetryEvent,
      actions: string[],
      success: boolean,
    ) => {
      time.advance(60_000);
      await memory.storeOutcome({
        incidentId: incidentIdFor(target.fingerprint),
        actions,
        success,
        durationMinutes: 5,
      });
    };

    await store(first, ["restart_container"], true);
    await store(second, ["restart_container"], true);
    await store(first, ["scale_out"], true);
    await store(second, ["traffic_shift", "alert_team"], false);
    await store(first, ["alert_team"], true);

    expect(await memory.mostEffectiveActions("api-service", 10)).toEqual([
      { action: "restart_container", successRate: 1, attempts: 2 },
      { action: "scale_out", successRate: 1, attempts: 1 },
      { action: "alert_team", successRate: 0.5, attempts: 2 },
      { action: "traffic_shift", successRate: 0, attempts: 1 },
    ]);
    expect(await memory.mostEffectiveActions("billing", 10)).toEqual([]);
  });
});
