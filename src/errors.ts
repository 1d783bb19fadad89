/**
 * Error taxonomy. Only gateway denials and tool failures reach callers,
 * and they do so as data on the result; the rest degrade and are logged.
 */

import type { GatewayCheck } from "./types";

/** Malformed telemetry input. `field` names the offending ingestion field. */
export class ValidationError extends Error {
  constructor(
    public field: string,
    public reason: string,
  ) {
    super(`${field}: ${reason}`);
    this.name = "ValidationError";
  }
}

/** Baseline state unusable; classification falls back to static thresholds */
export class ClassificationError extends Error {
  constructor(
    public component: string,
    public reason: string,
  ) {
    super(`Baseline for ${component} is corrupt: ${reason}`);
    this.name = "ClassificationError";
  }
}

export class MemoryUnavailableError extends Error {
  constructor(public reason: string) {
    super(`Incident memory unavailable: ${reason}`);
    this.name = "MemoryUnavailableError";
  }
}

export class UnknownIncidentError extends Error {
  constructor(public incidentId: string) {
    super(`Unknown incident: ${incidentId}`);
    this.name = "UnknownIncidentError";
  }
}

export class PolicyEvaluationError extends Error {
  constructor(
    public policy: string,
    public reason: string,
  ) {
    super(`Policy ${policy} skipped: ${reason}`);
    this.name = "PolicyEvaluationError";
  }
}

export class GatewayDeniedError extends Error {
  constructor(
    public check: GatewayCheck,
    public reason: string,
  ) {
    super(reason);
    this.name = "GatewayDeniedError";
  }
}

export class ToolExecutionError extends Error {
  constructor(
    public tool: string,
    public reason: string,
  ) {
    super(`${tool} failed: ${reason}`);
    this.name = "ToolExecutionError";
  }
}

export class TimeoutError extends Error {
  constructor(
    public label: string,
    public timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class CircuitOpenError extends Error {
  constructor(public circuit: string) {
    super(`Circuit ${circuit} is open`);
    this.name = "CircuitOpenError";
  }
}

export class AbortedError extends Error {
  constructor(public stage: string) {
    super(`Cancelled during ${stage}`);
    this.name = "AbortedError";
  }
}

/** Configuration could not be loaded. The one fatal condition at startup. */
export class ConfigError extends Error {
  constructor(
    public source: string,
    public reason: string,
  ) {
    super(`[${source}] ${reason}`);
    this.name = "ConfigError";
  }
}
