import { createHash } from "crypto";
import { ValidationError } from "../errors";
import type { Severity, TelemetryEvent } from "../types";
import { logger } from "../utils/logger";
import { checkSchema } from "../utils/validateSchema";
import eventSchema from "./event.schema.json";

/** Telemetry record as it arrives from the ingestion collaborator */
export type RawTelemetryRecord = {
  component: string;
  latency_p99: number;
  error_rate: number;
  throughput: number;
  cpu_util?: number | null;
  memory_util?: number | null;
  severity?: Severity;
  timestamp?: string;
  upstream_deps?: string[];
  downstream_deps?: string[];
};

export type FingerprintFields = {
  component: string;
  latencyP99: number;
  errorRate: number;
  throughput: number;
  cpuUtil: number | null;
  memoryUtil: number | null;
  severity: Severity;
};

export type SafeValidation =
  | { ok: true; event: TelemetryEvent }
  | { ok: false; error: ValidationError };

const NUMERIC_FIELDS = [
  "latency_p99",
  "error_rate",
  "throughput",
  "cpu_util",
  "memory_util",
] as const;

/**
 * SHA-256 over the canonical JSON of the fingerprinted fields.
 * Key order is fixed here, never taken from the input.
 */
export function computeFingerprint(fields: FingerprintFields): string {
  const canonical = JSON.stringify({
    component: fields.component,
    latency_p99: fields.latencyP99,
    error_rate: fields.errorRate,
    throughput: fields.throughput,
    cpu_util: fields.cpuUtil,
    memory_util: fields.memoryUtil,
    severity: fields.severity,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

function observedAt(timestamp: string | undefined, now: () => Date): string {
  if (timestamp === undefined) return now().toISOString();
  const parsed = new Date(timestamp);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError("timestamp", "must be an ISO 8601 date");
  }
  return parsed.toISOString();
}

/**
 * Normalize a raw ingestion record into a frozen TelemetryEvent.
 * Throws ValidationError naming the first offending field.
 */
export function validateEvent(
  raw: unknown,
  now: () => Date = () => new Date(),
): TelemetryEvent {
  const result = checkSchema<RawTelemetryRecord>(eventSchema, raw);
  if (!result.valid) {
    const issue = result.issues[0];
    throw new ValidationError(issue?.field ?? "(root)", issue?.message ?? "invalid record");
  }

  const record = result.data;
  for (const field of NUMERIC_FIELDS) {
    const value = record[field];
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new ValidationError(field, "must be a finite number");
    }
  }

  const fields: FingerprintFields = {
    component: record.component,
    latencyP99: record.latency_p99,
    errorRate: record.error_rate,
    throughput: record.throughput,
    cpuUtil: record.cpu_util ?? null,
    memoryUtil: record.memory_util ?? null,
    severity: record.severity ?? "low",
  };

  return Object.freeze({
    ...fields,
    observedAt: observedAt(record.timestamp, now),
    upstreamDeps: Object.freeze([...(record.upstream_deps ?? [])]),
    downstreamDeps: Object.freeze([...(record.downstream_deps ?? [])]),
    fingerprint: computeFingerprint(fields),
  });
}

export function safeValidateEvent(
  raw: unknown,
  now?: () => Date,
): SafeValidation {
  try {
    return { ok: true, event: validateEvent(raw, now) };
  } catch (err) {
    if (err instanceof ValidationError) {
      logger.rejected(err.field, err.reason);
      return { ok: false, error: err };
    }
    throw err;
  }
}
