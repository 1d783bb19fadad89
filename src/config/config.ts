import {
  DEFAULT_CLASSIFIER_CONFIG,
  type ClassifierConfig,
} from "../classification/anomalyClassifier";
import {
  DEFAULT_GATEWAY_CONFIG,
  type BusinessHours,
  type GatewayConfig,
} from "../gateway/safetyGateway";
import { DEFAULT_MEMORY_CONFIG } from "../memory/incidentMemory";
import { DEFAULT_POLICIES } from "../policy/defaultPolicies";
import type { HealingPolicyInput } from "../policy/policyEngine";
import type { CircuitBreakerOptions } from "../resilience/circuitBreaker";
import type { ExecutionMode } from "../types";

export type BreakerSettings = Pick<
  CircuitBreakerOptions,
  "failureThreshold" | "failureWindowMs" | "recoveryTimeoutMs"
>;

export type PipelineSettings = {
  recallK: number;
  recallTimeoutMs: number;
  policyTimeoutMs: number;
  /** Events processed at once by the stdin reader */
  concurrency: number;
};

export type MemorySettings = {
  maxIncidents: number;
  outcomeBucketSeconds: number;
  breaker: Partial<BreakerSettings>;
};

export type EmbeddingSettings = {
  provider: "metric" | "gemini";
  dimensions: number;
  componentBuckets: number;
};

export type HealgateConfig = {
  mode: ExecutionMode;
  pipeline: PipelineSettings;
  classifier: ClassifierConfig;
  memory: MemorySettings;
  embedding: EmbeddingSettings;
  policy: { maxTrackedComponents: number };
  policies: HealingPolicyInput[];
  gateway: GatewayConfig;
  inventory: { composePath: string | null };
  audit: {
    exportPath: string | null;
    /** Where to write the run's healing intents on shutdown */
    intentsPath: string | null;
  };
};

/** Shape of a configuration file: every section and field optional */
export type ConfigPatch = {
  mode?: ExecutionMode;
  pipeline?: Partial<PipelineSettings>;
  classifier?: Partial<ClassifierConfig>;
  memory?: Partial<MemorySettings>;
  embedding?: Partial<EmbeddingSettings>;
  policy?: { maxTrackedComponents?: number };
  policies?: HealingPolicyInput[];
  gateway?: Partial<Omit<GatewayConfig, "businessHours" | "breaker">> & {
    businessHours?: BusinessHours | null;
    breaker?: Partial<BreakerSettings>;
  };
  inventory?: { composePath?: string | null };
  audit?: { exportPath?: string | null; intentsPath?: string | null };
};

export const DEFAULT_CONFIG: HealgateConfig = {
  mode: "ADVISORY",
  pipeline: {
    recallK: 5,
    recallTimeoutMs: 2_000,
    policyTimeoutMs: 2_000,
    concurrency: 10,
  },
  classifier: DEFAULT_CLASSIFIER_CONFIG,
  memory: {
    maxIncidents: DEFAULT_MEMORY_CONFIG.maxIncidents,
    outcomeBucketSeconds: DEFAULT_MEMORY_CONFIG.outcomeBucketSeconds,
    breaker: {},
  },
  embedding: { provider: "metric", dimensions: 256, componentBuckets: 10 },
  policy: { maxTrackedComponents: 100 },
  policies: [...DEFAULT_POLICIES],
  gateway: { ...DEFAULT_GATEWAY_CONFIG, approvalSweepMs: 60_000 },
  inventory: { composePath: "docker-compose.yaml" },
  audit: { exportPath: null, intentsPath: null },
};

/**
 * Overlay a configuration file on a base config. Sections merge field by
 * field; arrays (policies, blacklist, days) replace the base value.
 */
export function mergeConfig(base: HealgateConfig, patch: ConfigPatch): HealgateConfig {
  return {
    mode: patch.mode ?? base.mode,
    pipeline: { ...base.pipeline, ...patch.pipeline },
    classifier: {
      ...base.classifier,
      ...patch.classifier,
      thresholds: { ...base.classifier.thresholds, ...patch.classifier?.thresholds },
      weights: { ...base.classifier.weights, ...patch.classifier?.weights },
    },
    memory: {
      ...base.memory,
      ...patch.memory,
      breaker: { ...base.memory.breaker, ...patch.memory?.breaker },
    },
    embedding: { ...base.embedding, ...patch.embedding },
    policy: { ...base.policy, ...patch.policy },
    policies: patch.policies ?? base.policies,
    gateway: {
      ...base.gateway,
      ...patch.gateway,
      breaker: { ...base.gateway.breaker, ...patch.gateway?.breaker },
    },
    inventory: { ...base.inventory, ...patch.inventory },
    audit: { ...base.audit, ...patch.audit },
  };
}
