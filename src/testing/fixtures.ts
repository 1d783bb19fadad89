/**
 * Shared builders for tests.
 */

import { ToolRegistry } from "../tools/registry";
import {
  type Tool,
  type ToolContext,
  type ToolMetadata,
  type ToolValidation,
  VALID,
} from "../tools/types";
import type { HealingIntent, JsonObject, ToolResult } from "../types";

export function makeIntent(overrides: Partial<HealingIntent> = {}): HealingIntent {
  return Object.freeze<HealingIntent>({
    intentId: "intent_0123456789abcdef",
    tool: "restart_container",
    component: "api-service",
    parameters: {},
    justification: "Event: api-service with 320ms latency, 18.0% errors.",
    confidence: 0.8,
    riskProfile: { blastRadius: 1, safetyLevel: "medium", safeForBusinessHours: false },
    incidentId: "inc_0123456789abcdef",
    fingerprint: "0123456789abcdef".repeat(4),
    policy: "test_policy",
    classification: "CRITICAL",
    detectedAt: "2026-03-02T10:00:00.000Z",
    historicalContext: { similarIncidents: 0, averageSimilarity: 0, toolSuccessRate: null },
    ...overrides,
  });
}

export function makeContext(
  parameters: JsonObject = {},
  component = "api-service",
): ToolContext {
  return {
    intent: makeIntent({ component, parameters }),
    component,
    parameters,
    signal: new AbortController().signal,
  };
}

/** In-process tool that records its executions instead of touching anything */
export class RecordingTool implements Tool {
  readonly metadata: ToolMetadata;
  readonly executed: string[] = [];

  constructor(name: string, metadata: Partial<ToolMetadata> = {}) {
    this.metadata = {
      name,
      description: `test ${name}`,
      safetyLevel: "low",
      timeoutMs: 1_000,
      requiredPermissions: [],
      ...metadata,
    };
  }

  validate(): ToolValidation {
    return VALID;
  }

  async execute(context: ToolContext): Promise<ToolResult> {
    this.executed.push(context.component);
    return { success: true, summary: `${this.metadata.name} applied to ${context.component}` };
  }
}

export const BUILTIN_TOOL_NAMES = [
  "restart_container",
  "scale_out",
  "rollback",
  "circuit_breaker",
  "traffic_shift",
  "alert_team",
] as const;

export function makeRegistry(): ToolRegistry {
  return new ToolRegistry(BUILTIN_TOOL_NAMES.map((name) => new RecordingTool(name)));
}
