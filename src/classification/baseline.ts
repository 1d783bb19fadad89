import { ClassificationError } from "../errors";
import type { MetricName } from "../types";

/** Exponentially weighted running statistics for one metric */
export type MetricBaseline = {
  mean: number;
  variance: number;
  samples: number;
};

export type ComponentBaseline = Partial<Record<MetricName, MetricBaseline>>;

export function emptyBaseline(): MetricBaseline {
  return { mean: 0, variance: 0, samples: 0 };
}

/**
 * Blend one observation into the baseline. The first sample seeds the mean.
 */
export function updateBaseline(
  baseline: MetricBaseline,
  value: number,
  alpha: number,
): MetricBaseline {
  if (baseline.samples === 0) {
    return { mean: value, variance: 0, samples: 1 };
  }
  const diff = value - baseline.mean;
  const increment = alpha * diff;
  return {
    mean: baseline.mean + increment,
    variance: (1 - alpha) * (baseline.variance + diff * increment),
    samples: baseline.samples + 1,
  };
}

export function assertBaselineHealthy(
  component: string,
  metric: MetricName,
  baseline: MetricBaseline,
): void {
  const { mean, variance, samples } = baseline;
  if (!Number.isFinite(mean) || mean < 0) {
    throw new ClassificationError(component, `${metric} mean is ${mean}`);
  }
  if (!Number.isFinite(variance) || variance < 0) {
    throw new ClassificationError(component, `${metric} variance is ${variance}`);
  }
  if (!Number.isInteger(samples) || samples < 0) {
    throw new ClassificationError(component, `${metric} sample count is ${samples}`);
  }
}
