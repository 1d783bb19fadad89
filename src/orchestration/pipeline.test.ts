import { getEventListeners } from "events";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, type HealgateConfig } from "../config/config";
import type { Capability } from "../gateway/safetyGateway";
import { MetricEmbeddingProvider } from "../memory/embedding";
import { IncidentMemory, incidentIdFor } from "../memory/incidentMemory";
import { ResilientMemory } from "../memory/resilientMemory";
import { PolicyEngine, type PolicyPlan } from "../policy/policyEngine";
import { RecordingTool, makeRegistry } from "../testing/fixtures";
import type { Classification, TelemetryEvent } from "../types";
import { computeFingerprint, validateEvent } from "../validation/eventValidator";
import { type HealgateContext, createContext } from "./context";
import { type PipelineDeps, Pipeline } from "./pipeline";

const NOW = Date.parse("2026-03-02T10:00:00.000Z");

const ADVISORY: Capability = { executionPermitted: false, approvalWorkflows: false, maxBlastRadius: 5 };
const ENTITLED: Capability = { executionPermitted: true, approvalWorkflows: true, maxBlastRadius: 5 };

const apiService = {
  component: "api-service",
  latency_p99: 320,
  error_rate: 0.18,
  throughput: 1250,
  cpu_util: 0.87,
  memory_util: 0.92,
};

const quiet = {
  component: "api-service",
  latency_p99: 50,
  error_rate: 0.01,
  throughput: 1000,
  cpu_util: 0.2,
  memory_util: 0.3,
};

const contexts: HealgateContext[] = [];

function context(
  capability: Capability = ADVISORY,
  config: Partial<HealgateConfig> = {},
): HealgateContext {
  const ctx = createContext(
    { ...DEFAULT_CONFIG, ...config },
    {
      capability,
      registry: makeRegistry(),
      embedder: new MetricEmbeddingProvider(),
      impact: ({ classification }) => ({ revenueAtRisk: 1200, level: classification.level }),
      now: () => NOW,
    },
  );
  contexts.push(ctx);
  return ctx;
}

function pipelineWith(ctx: HealgateContext, overrides: Partial<PipelineDeps>): Pipeline {
  return new Pipeline(
    {
      classifier: ctx.classifier,
      memory: ctx.memory,
      policies: ctx.policies,
      gateway: ctx.gateway,
      registry: ctx.registry,
      inventory: ctx.inventory,
      now: () => new Date(NOW),
      ...overrides,
    },
    { mode: ctx.config.mode, recallK: 5, recallTimeoutMs: 20, policyTimeoutMs: 20 },
  );
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

class HangingMemory extends ResilientMemory {
  search() {
    return new Promise<never>(() => {});
  }
}

class SlowPolicies extends PolicyEngine {
  delayMs = 50;

  async plan(
    event: TelemetryEvent,
    classification: Classification,
    signal?: AbortSignal,
  ): Promise<PolicyPlan> {
    await sleep(this.delayMs);
    return super.plan(event, classification, signal);
  }
}

afterEach(async () => {
  await Promise.all(contexts.splice(0).map((ctx) => ctx.dispose()));
});

describe("Pipeline", () => {
  it("turns the api-service event into advisory intents", async () => {
    const ctx = context();
    const result = await ctx.pipeline.process(apiService);

    expect(result.status).toBe("ANOMALY");
    expect(result.classification?.level).toBe("CRITICAL");
    expect(result.classification?.score).toBe(0.77);
    expect(result.incidentId).toBe(
      incidentIdFor(
        computeFingerprint({
          component: "api-service",
          latencyP99: 320,
          errorRate: 0.18,
          throughput: 1250,
          cpuUtil: 0.87,
          memoryUtil: 0.92,
          severity: "low",
        }),
      ),
    );
    expect(result.healingIntents.map((i) => i.tool)).toEqual([
      "circuit_breaker",
      "alert_team",
      "scale_out",
      "traffic_shift",
    ]);
    expect(result.healingIntents.map((i) => i.policy)).toEqual([
      "cascading_failure",
      "cascading_failure",
      "resource_exhaustion",
      "moderate_performance_issue",
    ]);
    expect(result.gatewayResponses.map((r) => r.status)).toEqual([
      "ADVISORY_ONLY",
      "ADVISORY_ONLY",
      "ADVISORY_ONLY",
      "ADVISORY_ONLY",
    ]);
    expect(result.businessImpact).toEqual({ revenueAtRisk: 1200, level: "CRITICAL" });
    expect(result.degraded).toEqual([]);
    expect(ctx.gateway.audit.size).toBe(4);
  });

  it("never executes a tool without the execution capability", async () => {
    const ctx = context(ADVISORY, { mode: "AUTONOMOUS" });
    await ctx.pipeline.process(apiService);

    for (const name of ctx.registry.names()) {
      const tool = ctx.registry.get(name);
      expect(tool instanceof RecordingTool ? tool.executed : []).toEqual([]);
    }
  });

  it("derives the same intent ids in independent runs", async () => {
    const first = await context().pipeline.process(apiService);
    const second = await context().pipeline.process(apiService);

    expect(second.healingIntents.map((i) => i.intentId)).toEqual(
      first.healingIntents.map((i) => i.intentId),
    );
    expect(second.incidentId).toBe(first.incidentId);
  });

  it("rejects a negative error rate without side effects", async () => {
    const ctx = context();
    const result = await ctx.pipeline.process({ ...apiService, error_rate: -0.1 });

    expect(result.status).toBe("REJECTED");
    expect(result.validationError?.field).toBe("error_rate");
    expect(result.healingIntents).toEqual([]);
    expect(ctx.gateway.audit.size).toBe(0);
    expect(ctx.classifier.baselineFor("api-service")).toBeUndefined();
    expect(ctx.memory.memory.stats().incidents).toBe(0);
  });

  it("stops at classification for normal events", async () => {
    const ctx = context();
    const result = await ctx.pipeline.process(quiet);

    expect(result.status).toBe("NORMAL");
    expect(result.incidentId).toBeNull();
    expect(ctx.memory.memory.stats().incidents).toBe(0);
    expect(ctx.gateway.audit.size).toBe(0);
  });

  it("recalls the earlier incident and holds policies in cooldown", async () => {
    const ctx = context();
    const first = await ctx.pipeline.process(apiService);
    const second = await ctx.pipeline.process(apiService);

    expect(second.status).toBe("ANOMALY");
    expect(second.recall.map((r) => r.incident.incidentId)).toEqual([first.incidentId]);
    expect(second.healingIntents).toEqual([]);
  });

  it("executes and records outcomes when entitled and autonomous", async () => {
    const ctx = context(ENTITLED, { mode: "AUTONOMOUS" });
    const result = await ctx.pipeline.process(apiService);
    await ctx.recorder.flush();

    expect(result.gatewayResponses.map((r) => r.status)).toEqual([
      "COMPLETED",
      "COMPLETED",
      "COMPLETED",
      "COMPLETED",
    ]);
    expect(ctx.memory.memory.stats().outcomes).toBe(4);
  });

  it("proceeds without history when recall times out", async () => {
    const ctx = context();
    const memory = new HangingMemory(new IncidentMemory(new MetricEmbeddingProvider()));
    const result = await pipelineWith(ctx, { memory }).process(apiService);

    expect(result.status).toBe("ANOMALY");
    expect(result.degraded).toEqual(["recall"]);
    expect(result.recall).toEqual([]);
    expect(result.healingIntents).toHaveLength(4);
  });

  it("drops a timed-out policy evaluation without committing it", async () => {
    const ctx = context();
    const policies = new SlowPolicies(ctx.config.policies, { now: () => NOW });
    const result = await pipelineWith(ctx, { policies }).process(apiService);

    expect(result.degraded).toEqual(["policy"]);
    expect(result.healingIntents).toEqual([]);

    await sleep(60);
    expect(policies.trackedComponents).toBe(0);

    policies.delayMs = 0;
    const event = validateEvent(apiService);
    const classification = result.classification;
    expect(classification).not.toBeNull();
    if (!classification) return;
    const decisions = await policies.evaluate(event, classification);
    expect(decisions.map((d) => d.policy)).toEqual([
      "cascading_failure",
      "resource_exhaustion",
      "moderate_performance_issue",
    ]);
  });

  it("reports a failing impact estimator as degraded", async () => {
    const ctx = context();
    const result = await pipelineWith(ctx, {
      impact: () => {
        throw new Error("calculator offline");
      },
    }).process(apiService);

    expect(result.businessImpact).toBeNull();
    expect(result.degraded).toEqual(["impact"]);
  });

  it("returns CANCELLED for an already aborted signal", async () => {
    const ctx = context();
    const controller = new AbortController();
    controller.abort();
    const result = await ctx.pipeline.process(apiService, { signal: controller.signal });

    expect(result.status).toBe("CANCELLED");
    expect(ctx.classifier.baselineFor("api-service")).toBeUndefined();
    expect(ctx.gateway.audit.size).toBe(0);
  });

  it("leaves no state behind when cancelled mid-flight, so a retry still acts", async () => {
    const ctx = context();
    let cancel: (() => void) | null = null;
    const pipeline = pipelineWith(ctx, {
      impact: () => {
        cancel?.();
        return {};
      },
    });

    const controller = new AbortController();
    cancel = () => controller.abort();
    const first = await pipeline.process(apiService, { signal: controller.signal });

    expect(first.status).toBe("CANCELLED");
    expect(ctx.gateway.audit.size).toBe(0);
    expect(ctx.classifier.baselineFor("api-service")).toBeUndefined();
    expect(ctx.memory.memory.stats().incidents).toBe(0);
    expect(ctx.policies.trackedComponents).toBe(0);

    cancel = null;
    const retry = await pipeline.process(apiService);

    expect(retry.status).toBe("ANOMALY");
    expect(retry.recall).toEqual([]);
    expect(retry.healingIntents.map((i) => i.tool)).toEqual([
      "circuit_breaker",
      "alert_team",
      "scale_out",
      "traffic_shift",
    ]);
    expect(ctx.classifier.baselineFor("api-service")?.latency_p99?.samples).toBe(1);
    expect(ctx.memory.memory.stats().incidents).toBe(1);
  });

  it("detaches from the caller's signal after every event", async () => {
    const ctx = context();
    const controller = new AbortController();

    for (let i = 0; i < 25; i++) {
      await ctx.pipeline.process(
        { ...apiService, latency_p99: 320 + i },
        { signal: controller.signal },
      );
    }

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });
});
