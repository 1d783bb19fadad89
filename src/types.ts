/**
 * Core domain types for healgate.
 * These types represent the data structures that flow through the pipeline.
 */

/** JSON-serializable value carried in intent and tool parameters */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Severity = "low" | "medium" | "high" | "critical";

/** Metric names as they appear on the ingestion record and in config */
export type MetricName =
  | "latency_p99"
  | "error_rate"
  | "throughput"
  | "cpu_util"
  | "memory_util";

export const METRIC_NAMES: readonly MetricName[] = [
  "latency_p99",
  "error_rate",
  "throughput",
  "cpu_util",
  "memory_util",
];

/** Canonical, validated telemetry event. Frozen once created. */
export type TelemetryEvent = Readonly<{
  component: string;
  latencyP99: number;
  errorRate: number;
  throughput: number;
  cpuUtil: number | null;
  memoryUtil: number | null;
  severity: Severity;
  observedAt: string;
  upstreamDeps: readonly string[];
  downstreamDeps: readonly string[];
  fingerprint: string;
}>;

export function metricValue(
  event: TelemetryEvent,
  metric: MetricName,
): number | null {
  switch (metric) {
    case "latency_p99":
      return event.latencyP99;
    case "error_rate":
      return event.errorRate;
    case "throughput":
      return event.throughput;
    case "cpu_util":
      return event.cpuUtil;
    case "memory_util":
      return event.memoryUtil;
  }
}

// Classification

export type ClassificationLevel =
  | "NORMAL"
  | "DEGRADING"
  | "CRITICAL"
  | "SYSTEMIC";

export const CLASSIFICATION_ORDER: readonly ClassificationLevel[] = [
  "NORMAL",
  "DEGRADING",
  "CRITICAL",
  "SYSTEMIC",
];

export type MetricScore = {
  metric: MetricName;
  score: number;
  source: "static" | "dynamic";
};

export type Classification = Readonly<{
  level: ClassificationLevel;
  score: number;
  affectedMetrics: readonly MetricScore[];
  /** True when the baseline was unusable and only static thresholds applied */
  fallback: boolean;
}>;

// Incident-outcome memory

export type IncidentNode = Readonly<{
  incidentId: string;
  event: TelemetryEvent;
  embedding: readonly number[];
  createdAt: number;
}>;

export type OutcomeNode = Readonly<{
  outcomeId: string;
  incidentId: string;
  actions: readonly string[];
  success: boolean;
  durationMinutes: number;
  lessons: string | null;
  recordedAt: number;
}>;

/** Directed "resolved-by" edge from an incident to one of its outcomes */
export type ResolvedByEdge = Readonly<{
  from: string;
  to: string;
  type: "resolved-by";
}>;

export type RecalledIncident = Readonly<{
  incident: IncidentNode;
  outcomes: readonly OutcomeNode[];
  distance: number;
  similarity: number;
}>;

export type ActionEffectiveness = {
  action: string;
  successRate: number;
  attempts: number;
};

// Policies

export type ComparisonOperator = ">" | "<" | ">=" | "<=" | "==" | "!=";

export type PolicyCondition = Readonly<{
  metric: MetricName;
  operator: ComparisonOperator;
  threshold: number;
}>;

export type PolicyAction = Readonly<{
  tool: string;
  parameters: Readonly<JsonObject>;
  /** Overrides the inventory-derived estimate when set */
  blastRadius: number | null;
}>;

export type HealingPolicy = Readonly<{
  name: string;
  conditions: readonly PolicyCondition[];
  actions: readonly PolicyAction[];
  priority: number;
  cooldownSeconds: number;
  maxExecutionsPerHour: number;
  terminal: boolean;
  enabled: boolean;
  minClassification: ClassificationLevel;
}>;

export type PolicyDecision = Readonly<{
  policy: string;
  priority: number;
  conditions: readonly PolicyCondition[];
  actions: readonly PolicyAction[];
}>;

// Intents and the safety gateway

export type SafetyLevel = "low" | "medium" | "high";

export type RiskProfile = Readonly<{
  blastRadius: number;
  safetyLevel: SafetyLevel;
  safeForBusinessHours: boolean;
}>;

export type HistoricalContext = Readonly<{
  similarIncidents: number;
  averageSimilarity: number;
  /** Success rate of this tool on the component, null without history */
  toolSuccessRate: number | null;
}>;

/** Immutable, declarative remediation proposal. Never itself an execution. */
export type HealingIntent = Readonly<{
  intentId: string;
  tool: string;
  component: string;
  parameters: Readonly<JsonObject>;
  justification: string;
  confidence: number;
  riskProfile: RiskProfile;
  incidentId: string;
  fingerprint: string;
  policy: string;
  classification: ClassificationLevel;
  detectedAt: string;
  historicalContext: HistoricalContext;
}>;

export type ExecutionMode = "ADVISORY" | "APPROVAL" | "AUTONOMOUS";

export type GatewayState =
  | "RECEIVED"
  | "VALIDATING"
  | "DENIED"
  | "PENDING_APPROVAL"
  | "APPROVED"
  | "ADVISORY_ONLY"
  | "EXECUTING"
  | "COMPLETED"
  | "FAILED";

/** States a response can settle in */
export type GatewayStatus = Extract<
  GatewayState,
  "DENIED" | "PENDING_APPROVAL" | "ADVISORY_ONLY" | "COMPLETED" | "FAILED"
>;

export type GatewayCheck =
  | "unknown_tool"
  | "blacklist"
  | "blast_radius"
  | "business_hours"
  | "circuit_breaker"
  | "cooldown"
  | "tool_precondition"
  | "approval";

export type ValidationOutcome = Readonly<{
  passed: boolean;
  check?: GatewayCheck;
  reason?: string;
}>;

export type ToolResult = Readonly<{
  success: boolean;
  summary: string;
  output?: string;
}>;

export type GatewayResult = Readonly<{
  /** Set on ADVISORY_ONLY: validation passed and the action would have run */
  wouldExecute?: boolean;
  tool?: ToolResult;
  durationMs?: number;
  /** Set on FAILED */
  error?: string;
}>;

export type GatewayResponse = Readonly<{
  status: GatewayStatus;
  intentId: string;
  reason?: string;
  approvalId?: string;
  result?: GatewayResult;
  duplicate: boolean;
  auditSeq: number;
}>;

/** Append-only audit entry per gateway decision */
export type ExecutionRecord = Readonly<{
  seq: number;
  intentId: string;
  tool: string;
  component: string;
  justification: string;
  mode: ExecutionMode;
  validation: ValidationOutcome;
  status: GatewayState;
  approvalId?: string;
  approver?: string;
  duplicateOf?: number;
  result?: GatewayResult;
  submittedAt: string;
  recordedAt: string;
}>;

/** Output of the external business-impact collaborator */
export type BusinessImpact = Readonly<Record<string, number | string | null>>;
