import { describe, expect, it } from "vitest";
import { AbortedError } from "../errors";
import { validateEvent } from "../validation/eventValidator";
import { AnomalyClassifier, bandScore, levelFor } from "./anomalyClassifier";

const apiService = validateEvent({
  component: "api-service",
  latency_p99: 320,
  error_rate: 0.18,
  throughput: 1250,
  cpu_util: 0.87,
  memory_util: 0.92,
});

function steady(latency: number, throughput = 1000) {
  return validateEvent({
    component: "checkout",
    latency_p99: latency,
    error_rate: 0.01,
    throughput,
  });
}

describe("bandScore", () => {
  const band = { warning: 150, critical: 300 };

  it("scores zero below warning and one at critical", () => {
    expect(bandScore(149, band)).toBe(0);
    expect(bandScore(300, band)).toBe(1);
    expect(bandScore(5000, band)).toBe(1);
  });

  it("interpolates between warning and critical", () => {
    expect(bandScore(150, band)).toBe(0.5);
    expect(bandScore(225, band)).toBe(0.75);
  });
});

describe("levelFor", () => {
  it("buckets scores at the documented boundaries", () => {
    expect(levelFor(0.29)).toBe("NORMAL");
    expect(levelFor(0.3)).toBe("DEGRADING");
    expect(levelFor(0.6)).toBe("CRITICAL");
    expect(levelFor(0.85)).toBe("SYSTEMIC");
  });
});

describe("AnomalyClassifier", () => {
  it("classifies the api-service event as CRITICAL on static thresholds", async () => {
    const classifier = new AnomalyClassifier();
    const result = await classifier.classify(apiService);

    expect(result.level).toBe("CRITICAL");
    expect(result.score).toBe(0.77);
    expect(result.fallback).toBe(false);
    expect(result.affectedMetrics).toEqual([
      { metric: "latency_p99", score: 1, source: "static" },
      { metric: "error_rate", score: 1, source: "static" },
      { metric: "cpu_util", score: 0.85, source: "static" },
      { metric: "memory_util", score: 1, source: "static" },
    ]);
  });

  it("ignores the baseline until enough samples have been seen", async () => {
    const classifier = new AnomalyClassifier();
    for (let i = 0; i < 4; i++) await classifier.classify(steady(100));

    const result = await classifier.classify(steady(140));
    expect(result.level).toBe("NORMAL");
    expect(result.score).toBe(0);
  });

  it("scores a latency spike against the learned baseline", async () => {
    const classifier = new AnomalyClassifier();
    for (let i = 0; i < 5; i++) await classifier.classify(steady(100));

    const result = await classifier.classify(steady(140));
    expect(result.level).toBe("DEGRADING");
    expect(result.score).toBe(0.3333);
    expect(result.affectedMetrics).toEqual([
      { metric: "latency_p99", score: 1, source: "dynamic" },
    ]);
  });

  it("scores throughput only when it drops", async () => {
    const classifier = new AnomalyClassifier();
    for (let i = 0; i < 5; i++) await classifier.classify(steady(100));

    const surge = await classifier.classify(steady(100, 1400));
    expect(surge.score).toBe(0);

    const fresh = new AnomalyClassifier();
    for (let i = 0; i < 5; i++) await fresh.classify(steady(100));
    const drop = await fresh.classify(steady(100, 600));
    expect(drop.affectedMetrics).toEqual([
      { metric: "throughput", score: 1, source: "dynamic" },
    ]);
  });

  it("applies configured weights", async () => {
    const classifier = new AnomalyClassifier({
      weights: { error_rate: 3 },
    });
    const result = await classifier.classify(apiService);
    // (1 + 3 + 0 + 0.85 + 1) / 7
    expect(result.score).toBe(0.8357);
  });

  it("updates the baseline after scoring", async () => {
    const classifier = new AnomalyClassifier();
    await classifier.classify(steady(100));
    await classifier.classify(steady(200));

    const baseline = classifier.baselineFor("checkout");
    expect(baseline?.latency_p99).toEqual({ mean: 130, variance: 2100, samples: 2 });
  });

  it("resets a corrupt baseline and falls back to static thresholds", async () => {
    const classifier = new AnomalyClassifier();
    classifier.restoreBaseline("api-service", {
      latency_p99: { mean: Number.NaN, variance: 0, samples: 10 },
    });

    const result = await classifier.classify(apiService);
    expect(result.fallback).toBe(true);
    expect(result.level).toBe("CRITICAL");
    expect(classifier.baselineFor("api-service")?.latency_p99).toEqual({
      mean: 320,
      variance: 0,
      samples: 1,
    });
  });

  it("leaves the baseline untouched when cancelled", async () => {
    const classifier = new AnomalyClassifier();
    const controller = new AbortController();
    controller.abort();

    await expect(
      classifier.classify(apiService, controller.signal),
    ).rejects.toBeInstanceOf(AbortedError);
    expect(classifier.baselineFor("api-service")).toBeUndefined();
  });

  it("learns from an assessed event only once it is committed", async () => {
    const classifier = new AnomalyClassifier();
    const assessment = await classifier.assess(steady(100));

    expect(assessment.classification.level).toBe("NORMAL");
    expect(classifier.baselineFor("checkout")).toBeUndefined();

    await classifier.classify(steady(200));
    await assessment.commit();
    expect(classifier.baselineFor("checkout")?.latency_p99?.samples).toBe(2);
  });

  it("serializes concurrent updates for one component", async () => {
    const classifier = new AnomalyClassifier();
    await Promise.all(
      Array.from({ length: 10 }, () => classifier.classify(steady(100))),
    );
    expect(classifier.baselineFor("checkout")?.latency_p99?.samples).toBe(10);
  });
});
