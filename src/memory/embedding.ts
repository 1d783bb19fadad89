/**
 * Embedding providers. Recall only requires a stable dimensionality;
 * how vectors are produced is up to the provider.
 */

import { createHash } from "crypto";
import type {
  EmbedContentParameters,
  EmbedContentResponse,
} from "@google/genai";
import type { TelemetryEvent } from "../types";
import { withRetry } from "../utils/helpers";
import { EMBEDDING_MODEL } from "../llm/model";

export type EmbeddingProvider = {
  readonly dimensions: number;
  embed(event: TelemetryEvent): Promise<number[]>;
};

const SEVERITY_RANK = { low: 0, medium: 1 / 3, high: 2 / 3, critical: 1 } as const;

// Metrics are scaled onto [0, 1] before hashing the component into the tail.
const LATENCY_SCALE_MS = 1000;
const THROUGHPUT_SCALE = 10_000;

function squash(value: number, scale: number): number {
  return value / (value + scale);
}

/**
 * Deterministic embedding: six normalized metric features followed by a
 * hashed one-hot bucket for the component name, so incidents on the same
 * component sit closer together.
 */
export class MetricEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions: number;

  constructor(private readonly componentBuckets = 10) {
    this.dimensions = 6 + componentBuckets;
  }

  async embed(event: TelemetryEvent): Promise<number[]> {
    const vector = [
      squash(event.latencyP99, LATENCY_SCALE_MS),
      event.errorRate,
      squash(event.throughput, THROUGHPUT_SCALE),
      event.cpuUtil ?? 0,
      event.memoryUtil ?? 0,
      SEVERITY_RANK[event.severity],
    ];

    const buckets = new Array<number>(this.componentBuckets).fill(0);
    const digest = createHash("sha256").update(event.component).digest();
    buckets[digest.readUInt32BE(0) % this.componentBuckets] = 1;

    return [...vector, ...buckets];
  }
}

export function describeEvent(event: TelemetryEvent): string {
  const parts = [
    `component ${event.component}`,
    `p99 latency ${event.latencyP99}ms`,
    `error rate ${(event.errorRate * 100).toFixed(1)}%`,
    `throughput ${event.throughput} req/s`,
  ];
  if (event.cpuUtil !== null) parts.push(`cpu ${(event.cpuUtil * 100).toFixed(0)}%`);
  if (event.memoryUtil !== null) parts.push(`memory ${(event.memoryUtil * 100).toFixed(0)}%`);
  parts.push(`severity ${event.severity}`);
  return parts.join(", ");
}

/** The slice of the GoogleGenAI client the provider calls */
export type EmbeddingClient = {
  models: {
    embedContent(params: EmbedContentParameters): Promise<EmbedContentResponse>;
  };
};

/** Learned embedding through the Gemini embeddings API */
export class GeminiEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: EmbeddingClient,
    readonly dimensions = 256,
    private readonly model = EMBEDDING_MODEL,
  ) {}

  async embed(event: TelemetryEvent): Promise<number[]> {
    const response = await withRetry(() =>
      this.client.models.embedContent({
        model: this.model,
        contents: describeEvent(event),
        config: { outputDimensionality: this.dimensions },
      }),
    );

    const values = response.embeddings?.[0]?.values;
    if (!values) throw new Error("Empty embedding response");
    return values;
  }
}
