/**
 * Wires every component once per process.
 */

import { AnomalyClassifier } from "../classification/anomalyClassifier";
import type { EmbeddingSettings, HealgateConfig } from "../config/config";
import { type Capability, SafetyGateway } from "../gateway/safetyGateway";
import { EMPTY_INVENTORY, type Inventory } from "../infrastructure/compose";
import { createGeminiClient } from "../llm/model";
import {
  type EmbeddingProvider,
  GeminiEmbeddingProvider,
  MetricEmbeddingProvider,
} from "../memory/embedding";
import { IncidentMemory } from "../memory/incidentMemory";
import { ResilientMemory } from "../memory/resilientMemory";
import { PolicyEngine } from "../policy/policyEngine";
import { OutcomeRecorder } from "../recorder/outcomeRecorder";
import { createBuiltinRegistry } from "../tools";
import type { ToolRegistry } from "../tools/registry";
import { logger } from "../utils/logger";
import { type ImpactEstimator, Pipeline } from "./pipeline";

export type ContextDeps = {
  /** Supplied by the deployment's entitlement check, never by config */
  capability: Capability;
  registry?: ToolRegistry;
  embedder?: EmbeddingProvider;
  impact?: ImpactEstimator;
  inventory?: Inventory;
  now?: () => number;
};

export type HealgateContext = {
  readonly config: HealgateConfig;
  readonly inventory: Inventory;
  readonly registry: ToolRegistry;
  readonly classifier: AnomalyClassifier;
  readonly memory: ResilientMemory;
  readonly policies: PolicyEngine;
  readonly gateway: SafetyGateway;
  readonly recorder: OutcomeRecorder;
  readonly pipeline: Pipeline;
  /** Stop background timers and wait for outcome writes */
  dispose(): Promise<void>;
};

export function createEmbedder(settings: EmbeddingSettings): EmbeddingProvider {
  if (settings.provider === "gemini") {
    const client = createGeminiClient();
    if (client) return new GeminiEmbeddingProvider(client, settings.dimensions);
    logger.warn("GEMINI_API_KEY is not set, using metric embeddings");
  }
  return new MetricEmbeddingProvider(settings.componentBuckets);
}

export function createContext(
  config: HealgateConfig,
  deps: ContextDeps,
): HealgateContext {
  const now = deps.now ?? (() => Date.now());
  const inventory = deps.inventory ?? EMPTY_INVENTORY;
  const registry =
    deps.registry ??
    createBuiltinRegistry({ knownTargets: () => new Set(inventory.components) });

  const classifier = new AnomalyClassifier(config.classifier);
  const memory = new ResilientMemory(
    new IncidentMemory(deps.embedder ?? createEmbedder(config.embedding), {
      maxIncidents: config.memory.maxIncidents,
      outcomeBucketSeconds: config.memory.outcomeBucketSeconds,
      now,
    }),
    { ...config.memory.breaker, now },
  );
  const policies = new PolicyEngine(config.policies, {
    maxTrackedComponents: config.policy.maxTrackedComponents,
    now,
  });
  const recorder = new OutcomeRecorder(memory);
  const gateway = new SafetyGateway(
    { registry, capability: deps.capability, inventory, observer: recorder, now },
    config.gateway,
  );
  const pipeline = new Pipeline(
    {
      classifier,
      memory,
      policies,
      gateway,
      registry,
      inventory,
      impact: deps.impact,
      now: () => new Date(now()),
    },
    {
      mode: config.mode,
      recallK: config.pipeline.recallK,
      recallTimeoutMs: config.pipeline.recallTimeoutMs,
      policyTimeoutMs: config.pipeline.policyTimeoutMs,
    },
  );

  return {
    config,
    inventory,
    registry,
    classifier,
    memory,
    policies,
    gateway,
    recorder,
    pipeline,
    async dispose() {
      gateway.dispose();
      await recorder.flush();
    },
  };
}
