/**
 * Anomaly classification against static thresholds and per-component
 * adaptive baselines.
 */

import { ClassificationError } from "../errors";
import {
  type Classification,
  type ClassificationLevel,
  type MetricName,
  type MetricScore,
  type TelemetryEvent,
  METRIC_NAMES,
  metricValue,
} from "../types";
import { clamp, round, throwIfAborted } from "../utils/helpers";
import { logger } from "../utils/logger";
import { LRUMap } from "../utils/lru";
import { KeyedMutex } from "../utils/mutex";
import {
  type ComponentBaseline,
  type MetricBaseline,
  assertBaselineHealthy,
  emptyBaseline,
  updateBaseline,
} from "./baseline";

export type ThresholdBand = { warning: number; critical: number };

export type ClassifierConfig = {
  alpha: number;
  minSamples: number;
  zWarning: number;
  zCritical: number;
  /** Lower bound on the deviation, as a fraction of the mean */
  minRelativeStd: number;
  maxTrackedComponents: number;
  thresholds: Partial<Record<MetricName, ThresholdBand>>;
  weights: Partial<Record<MetricName, number>>;
};

/** A classification whose baseline update is still pending */
export type Assessment = {
  classification: Classification;
  commit(): Promise<void>;
};

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  alpha: 0.3,
  minSamples: 5,
  zWarning: 2,
  zCritical: 4,
  minRelativeStd: 0.1,
  maxTrackedComponents: 1000,
  thresholds: {
    latency_p99: { warning: 150, critical: 300 },
    error_rate: { warning: 0.05, critical: 0.15 },
    cpu_util: { warning: 0.8, critical: 0.9 },
    memory_util: { warning: 0.8, critical: 0.9 },
  },
  weights: {},
};

// Throughput hurts when it falls; everything else when it rises.
const LOWER_IS_WORSE: ReadonlySet<MetricName> = new Set(["throughput"]);

/**
 * 0 below warning, linear from 0.5 to 1 between warning and critical,
 * 1 at or above critical.
 */
export function bandScore(value: number, band: ThresholdBand): number {
  if (value < band.warning) return 0;
  if (value >= band.critical) return 1;
  return 0.5 + (0.5 * (value - band.warning)) / (band.critical - band.warning);
}

export function levelFor(score: number): ClassificationLevel {
  if (score < 0.3) return "NORMAL";
  if (score < 0.6) return "DEGRADING";
  if (score < 0.85) return "CRITICAL";
  return "SYSTEMIC";
}

export class AnomalyClassifier {
  private readonly config: ClassifierConfig;
  private readonly baselines: LRUMap<string, ComponentBaseline>;
  private readonly locks = new KeyedMutex();

  constructor(config: Partial<ClassifierConfig> = {}) {
    this.config = { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
    this.baselines = new LRUMap(this.config.maxTrackedComponents);
  }

  /** Classify and fold the event into the component's baseline */
  async classify(
    event: TelemetryEvent,
    signal?: AbortSignal,
  ): Promise<Classification> {
    const assessment = await this.assess(event, signal);
    throwIfAborted(signal, "classification");
    await assessment.commit();
    return assessment.classification;
  }

  /**
   * Classify without touching the baseline. The event is learned from
   * only when the returned assessment is committed.
   */
  async assess(event: TelemetryEvent, signal?: AbortSignal): Promise<Assessment> {
    throwIfAborted(signal, "classification");

    const classification = await this.locks.runExclusive(event.component, () => {
      const baseline = this.baselines.get(event.component) ?? {};
      let fallback = false;

      try {
        this.checkBaseline(event.component, baseline);
      } catch (err) {
        if (!(err instanceof ClassificationError)) throw err;
        logger.warn("Baseline reset, using static thresholds", {
          Component: err.component,
          Reason: err.reason,
        });
        fallback = true;
      }

      const scores = this.scoreMetrics(event, fallback ? null : baseline);
      return this.aggregate(scores, fallback);
    });

    return {
      classification,
      commit: () =>
        this.locks.runExclusive(event.component, () => {
          this.baselines.set(event.component, this.advance(event, this.current(event.component)));
        }),
    };
  }

  /** Read-only copy of a component's baseline */
  baselineFor(component: string): ComponentBaseline | undefined {
    const baseline = this.baselines.peek(component);
    if (!baseline) return undefined;
    return Object.freeze(
      Object.fromEntries(
        Object.entries(baseline).map(([metric, stats]) => [
          metric,
          Object.freeze({ ...stats }),
        ]),
      ),
    );
  }

  /** Seed a component's baseline, e.g. from a previous run */
  restoreBaseline(component: string, baseline: ComponentBaseline): void {
    this.baselines.set(component, { ...baseline });
  }

  // Baseline to advance from; an unhealthy one starts over.
  private current(component: string): ComponentBaseline {
    const baseline = this.baselines.get(component) ?? {};
    try {
      this.checkBaseline(component, baseline);
      return baseline;
    } catch (err) {
      if (!(err instanceof ClassificationError)) throw err;
      return {};
    }
  }

  private checkBaseline(component: string, baseline: ComponentBaseline): void {
    for (const metric of METRIC_NAMES) {
      const stats = baseline[metric];
      if (stats) assertBaselineHealthy(component, metric, stats);
    }
  }

  private scoreMetrics(
    event: TelemetryEvent,
    baseline: ComponentBaseline | null,
  ): MetricScore[] {
    const scores: MetricScore[] = [];

    for (const metric of METRIC_NAMES) {
      const value = metricValue(event, metric);
      if (value === null) continue;

      const band = this.config.thresholds[metric];
      const staticScore = band ? bandScore(value, band) : 0;
      const stats = baseline?.[metric];
      const dynamicScore = stats ? this.dynamicScore(metric, value, stats) : 0;

      scores.push(
        dynamicScore > staticScore
          ? { metric, score: round(dynamicScore), source: "dynamic" }
          : { metric, score: round(staticScore), source: "static" },
      );
    }

    return scores;
  }

  private dynamicScore(
    metric: MetricName,
    value: number,
    stats: MetricBaseline,
  ): number {
    if (stats.samples < this.config.minSamples) return 0;

    const std = Math.max(
      Math.sqrt(stats.variance),
      this.config.minRelativeStd * stats.mean,
      Number.EPSILON,
    );
    const deviation = LOWER_IS_WORSE.has(metric)
      ? stats.mean - value
      : value - stats.mean;
    const z = deviation / std;

    return bandScore(z, {
      warning: this.config.zWarning,
      critical: this.config.zCritical,
    });
  }

  private aggregate(scores: MetricScore[], fallback: boolean): Classification {
    let weighted = 0;
    let totalWeight = 0;

    for (const { metric, score } of scores) {
      const weight = this.config.weights[metric] ?? 1;
      weighted += weight * score;
      totalWeight += weight;
    }

    const score = round(clamp(totalWeight > 0 ? weighted / totalWeight : 0, 0, 1));

    return Object.freeze({
      level: levelFor(score),
      score,
      affectedMetrics: Object.freeze(scores.filter((s) => s.score > 0)),
      fallback,
    });
  }

  private advance(
    event: TelemetryEvent,
    baseline: ComponentBaseline,
  ): ComponentBaseline {
    const next: ComponentBaseline = { ...baseline };
    for (const metric of METRIC_NAMES) {
      const value = metricValue(event, metric);
      if (value === null) continue;
      next[metric] = updateBaseline(
        baseline[metric] ?? emptyBaseline(),
        value,
        this.config.alpha,
      );
    }
    return next;
  }
}
