/**
 * HealingIntent construction: deterministic ids, confidence and a
 * human-readable justification for each candidate action.
 */

import { createHash } from "crypto";
import type { ToolMetadata } from "../tools/types";
import type {
  Classification,
  HealingIntent,
  JsonObject,
  JsonValue,
  PolicyAction,
  PolicyCondition,
  PolicyDecision,
  RecalledIncident,
  TelemetryEvent,
} from "../types";
import { round } from "../utils/helpers";

export const MAX_JUSTIFICATION_LENGTH = 1000;

/** How much a classification score is trusted for each tool */
export const TOOL_CONFIDENCE_WEIGHTS: Readonly<Record<string, number>> = {
  restart_container: 1.0,
  scale_out: 0.95,
  circuit_breaker: 0.9,
  traffic_shift: 0.85,
  rollback: 0.8,
  alert_team: 0.99,
};

const DEFAULT_TOOL_WEIGHT = 0.8;
const HISTORY_BOOST = 1.1;

export type IntentInput = {
  event: TelemetryEvent;
  classification: Classification;
  incidentId: string;
  decision: PolicyDecision;
  action: PolicyAction;
  recall: readonly RecalledIncident[];
  /** Historical success rate of this tool on the component, if known */
  toolSuccessRate: number | null;
  /** Registered tool, if any; unknown tools still produce an intent */
  tool: ToolMetadata | undefined;
  /** Inventory estimate, used when the action does not set one */
  estimatedBlastRadius: number;
};

function normalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const items = value.map(normalize);
    Object.freeze(items);
    return items;
  }
  if (value !== null && typeof value === "object") {
    return normalizeParameters(value);
  }
  return value;
}

/** Sorted-key, deeply frozen copy, so equal parameters hash equally */
export function normalizeParameters(parameters: Readonly<JsonObject>): JsonObject {
  const out: JsonObject = {};
  for (const key of Object.keys(parameters).sort()) {
    const value = parameters[key];
    if (value !== undefined) out[key] = normalize(value);
  }
  return Object.freeze(out);
}

export function computeIntentId(
  fingerprint: string,
  tool: string,
  component: string,
  parameters: Readonly<JsonObject>,
): string {
  const canonical = JSON.stringify({
    fingerprint,
    tool,
    component,
    parameters: normalizeParameters(parameters),
  });
  return `intent_${createHash("sha256").update(canonical).digest("hex").slice(0, 16)}`;
}

export function computeConfidence(
  score: number,
  tool: string,
  similarIncidents: number,
): number {
  const weight = TOOL_CONFIDENCE_WEIGHTS[tool] ?? DEFAULT_TOOL_WEIGHT;
  const boost = similarIncidents > 0 ? HISTORY_BOOST : 1;
  return round(Math.min(1, score * weight * boost));
}

function describeCondition({ metric, operator, threshold }: PolicyCondition): string {
  return `${metric} ${operator} ${threshold}`;
}

export function buildJustification(input: IntentInput): string {
  const { event, classification, decision, action, recall, toolSuccessRate } = input;
  const parts = [
    `Event: ${event.component} with ${event.latencyP99}ms latency, ${(event.errorRate * 100).toFixed(1)}% errors.`,
    `Policy ${decision.policy} matched (${decision.conditions.map(describeCondition).join(" and ")}) at ${classification.level} severity (score ${classification.score.toFixed(2)}).`,
  ];
  if (recall.length > 0) {
    parts.push(`Based on ${recall.length} similar incident${recall.length === 1 ? "" : "s"}.`);
  }
  if (toolSuccessRate !== null) {
    parts.push(
      `Historically ${action.tool} has ${Math.round(toolSuccessRate * 100)}% success rate.`,
    );
  }

  const text = parts.join(" ");
  return text.length > MAX_JUSTIFICATION_LENGTH
    ? `${text.slice(0, MAX_JUSTIFICATION_LENGTH - 3)}...`
    : text;
}

export function createHealingIntent(input: IntentInput): HealingIntent {
  const { event, classification, action, recall, tool } = input;
  const parameters = normalizeParameters(action.parameters);
  const averageSimilarity =
    recall.length > 0
      ? round(recall.reduce((sum, r) => sum + r.similarity, 0) / recall.length)
      : 0;

  return Object.freeze({
    intentId: computeIntentId(event.fingerprint, action.tool, event.component, parameters),
    tool: action.tool,
    component: event.component,
    parameters,
    justification: buildJustification(input),
    confidence: computeConfidence(classification.score, action.tool, recall.length),
    riskProfile: Object.freeze({
      blastRadius: action.blastRadius ?? input.estimatedBlastRadius,
      safetyLevel: tool?.safetyLevel ?? "high",
      safeForBusinessHours: tool?.safeForBusinessHours ?? false,
    }),
    incidentId: input.incidentId,
    fingerprint: event.fingerprint,
    policy: input.decision.policy,
    classification: classification.level,
    detectedAt: event.observedAt,
    historicalContext: Object.freeze({
      similarIncidents: recall.length,
      averageSimilarity,
      toolSuccessRate: input.toolSuccessRate,
    }),
  });
}
