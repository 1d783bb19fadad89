/**
 * Per-event decision pipeline.
 *
 * 1. Validate and fingerprint the raw record
 * 2. Classify against the component's baseline
 * 3. Recall similar incidents and evaluate policies, in parallel
 * 4. Commit the baseline update, policy firings and the incident
 * 5. Turn each fired action into a HealingIntent
 * 6. Submit every intent to the safety gateway
 *
 * Recall and policy evaluation are each bounded by a timeout. A branch
 * that times out contributes nothing instead of failing the event.
 * Nothing is committed for an event cancelled before step 4.
 */

import type { AnomalyClassifier } from "../classification/anomalyClassifier";
import { AbortedError, TimeoutError } from "../errors";
import type { SafetyGateway } from "../gateway/safetyGateway";
import type { Inventory } from "../infrastructure/compose";
import { createHealingIntent } from "../intents/healingIntent";
import { type PendingRecall, incidentIdFor } from "../memory/incidentMemory";
import type { ResilientMemory } from "../memory/resilientMemory";
import type { PolicyEngine, PolicyPlan } from "../policy/policyEngine";
import type { ToolRegistry } from "../tools/registry";
import type {
  ActionEffectiveness,
  BusinessImpact,
  Classification,
  ExecutionMode,
  GatewayResponse,
  HealingIntent,
  PolicyDecision,
  RecalledIncident,
  TelemetryEvent,
} from "../types";
import { getErrorMessage, throwIfAborted, withTimeout } from "../utils/helpers";
import { logger } from "../utils/logger";
import { safeValidateEvent } from "../validation/eventValidator";

export type PipelineStatus = "REJECTED" | "NORMAL" | "ANOMALY" | "CANCELLED";

/** Stages whose contribution was dropped for this event */
export type DegradedStage = "recall" | "policy" | "impact";

export type PipelineResult = Readonly<{
  status: PipelineStatus;
  incidentId: string | null;
  classification: Classification | null;
  healingIntents: readonly HealingIntent[];
  gatewayResponses: readonly GatewayResponse[];
  businessImpact: BusinessImpact | null;
  recall: readonly RecalledIncident[];
  degraded: readonly DegradedStage[];
  validationError?: Readonly<{ field: string; reason: string }>;
}>;

export type ImpactEstimator = (input: {
  event: TelemetryEvent;
  classification: Classification;
}) => BusinessImpact | Promise<BusinessImpact>;

export type PipelineConfig = {
  mode: ExecutionMode;
  recallK: number;
  recallTimeoutMs: number;
  policyTimeoutMs: number;
};

export type PipelineDeps = {
  classifier: AnomalyClassifier;
  memory: ResilientMemory;
  policies: PolicyEngine;
  gateway: SafetyGateway;
  registry: ToolRegistry;
  inventory: Inventory;
  impact?: ImpactEstimator;
  now?: () => Date;
};

export type ProcessOptions = {
  signal?: AbortSignal;
};

type RecallBranch = {
  incidents: RecalledIncident[];
  effectiveness: ActionEffectiveness[];
  pending: PendingRecall | null;
};

const NO_RECALL: RecallBranch = { incidents: [], effectiveness: [], pending: null };

const EFFECTIVENESS_LIMIT = 50;

function emptyResult(
  status: PipelineStatus,
  partial: Partial<PipelineResult> = {},
): PipelineResult {
  return Object.freeze({
    status,
    incidentId: null,
    classification: null,
    healingIntents: [],
    gatewayResponses: [],
    businessImpact: null,
    recall: [],
    degraded: [],
    ...partial,
  });
}

type LinkedController = {
  controller: AbortController;
  /** Detach from the parent signal */
  dispose: () => void;
};

/** A child controller that aborts with its parent until disposed */
function linkedController(parent: AbortSignal | undefined): LinkedController {
  const controller = new AbortController();
  if (!parent || parent.aborted) {
    if (parent?.aborted) controller.abort();
    return { controller, dispose: () => {} };
  }

  const onAbort = () => controller.abort();
  parent.addEventListener("abort", onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener("abort", onAbort),
  };
}

export class Pipeline {
  private readonly now: () => Date;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly config: PipelineConfig,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async process(raw: unknown, options: ProcessOptions = {}): Promise<PipelineResult> {
    const { signal } = options;

    const validation = safeValidateEvent(raw, this.now);
    if (!validation.ok) {
      return emptyResult("REJECTED", {
        validationError: Object.freeze({
          field: validation.error.field,
          reason: validation.error.reason,
        }),
      });
    }

    try {
      return await this.run(validation.event, signal);
    } catch (err) {
      if (err instanceof AbortedError) {
        logger.info(`Processing of ${validation.event.component} cancelled (${err.stage})`);
        return emptyResult("CANCELLED", {
          incidentId: incidentIdFor(validation.event.fingerprint),
        });
      }
      throw err;
    }
  }

  private async run(
    event: TelemetryEvent,
    signal: AbortSignal | undefined,
  ): Promise<PipelineResult> {
    const assessment = await this.deps.classifier.assess(event, signal);
    const { classification } = assessment;
    logger.classified(event.component, classification);

    if (classification.level === "NORMAL") {
      throwIfAborted(signal, "classification");
      await assessment.commit();
      return emptyResult("NORMAL", { classification });
    }

    const incidentId = incidentIdFor(event.fingerprint);
    const degraded: DegradedStage[] = [];

    const [recallOutcome, policyOutcome] = await Promise.allSettled([
      this.recallBranch(event, signal),
      this.policyBranch(event, classification, signal),
    ]);
    throwIfAborted(signal, "analysis");

    const recall = this.settle(recallOutcome, "recall", degraded) ?? NO_RECALL;
    const plan = this.settle(policyOutcome, "policy", degraded);
    logger.recalled(recall.incidents);

    const businessImpact = await this.estimateImpact(event, classification, degraded);

    // Last point at which cancellation leaves no trace.
    throwIfAborted(signal, "commit");
    await assessment.commit();
    const decisions = plan ? await plan.commit() : [];
    if (recall.pending) {
      const stored = await this.deps.memory.remember(recall.pending);
      if (!stored.available) {
        logger.warn("Incident not stored", { Incident: incidentId, Reason: stored.reason });
      }
    }

    const intents = this.buildIntents(event, classification, incidentId, decisions, recall);

    const gatewayResponses: GatewayResponse[] = [];
    for (const intent of intents) {
      throwIfAborted(signal, "gateway submission");
      logger.intent(intent);
      const response = await this.deps.gateway.submit(intent, this.config.mode);
      logger.gateway(intent, response);
      gatewayResponses.push(response);
    }

    return Object.freeze({
      status: "ANOMALY",
      incidentId,
      classification,
      healingIntents: Object.freeze(intents),
      gatewayResponses: Object.freeze(gatewayResponses),
      businessImpact,
      recall: Object.freeze(recall.incidents),
      degraded: Object.freeze(degraded),
    });
  }

  private async recallBranch(
    event: TelemetryEvent,
    signal: AbortSignal | undefined,
  ): Promise<RecallBranch> {
    const { controller, dispose } = linkedController(signal);
    const work = async (): Promise<RecallBranch> => {
      const searched = await this.deps.memory.search(
        event,
        this.config.recallK,
        controller.signal,
      );
      if (!searched.available) {
        logger.warn("Proceeding without historical context", { Reason: searched.reason });
        return NO_RECALL;
      }
      const ranked = await this.deps.memory.mostEffectiveActions(
        event.component,
        EFFECTIVENESS_LIMIT,
      );
      return {
        incidents: searched.value.incidents,
        effectiveness: ranked.available ? ranked.value : [],
        pending: searched.value,
      };
    };

    try {
      return await withTimeout(work(), this.config.recallTimeoutMs, "recall", () =>
        controller.abort(),
      );
    } finally {
      dispose();
    }
  }

  // A plan that arrives after its timeout is dropped uncommitted.
  private async policyBranch(
    event: TelemetryEvent,
    classification: Classification,
    signal: AbortSignal | undefined,
  ): Promise<PolicyPlan> {
    const { controller, dispose } = linkedController(signal);
    try {
      return await withTimeout(
        this.deps.policies.plan(event, classification, controller.signal),
        this.config.policyTimeoutMs,
        "policy evaluation",
        () => controller.abort(),
      );
    } finally {
      dispose();
    }
  }

  /** Unwrap a branch; a timed-out branch yields null and is marked degraded */
  private settle<T>(
    outcome: PromiseSettledResult<T>,
    stage: DegradedStage,
    degraded: DegradedStage[],
  ): T | null {
    if (outcome.status === "fulfilled") return outcome.value;

    const err: unknown = outcome.reason;
    if (!(err instanceof TimeoutError)) throw err;

    logger.warn(`Proceeding without ${stage}`, { Reason: err.message });
    degraded.push(stage);
    return null;
  }

  private buildIntents(
    event: TelemetryEvent,
    classification: Classification,
    incidentId: string,
    decisions: readonly PolicyDecision[],
    recall: RecallBranch,
  ): HealingIntent[] {
    const seen = new Set<string>();
    const intents: HealingIntent[] = [];

    for (const decision of decisions) {
      for (const action of decision.actions) {
        const history = recall.effectiveness.find((e) => e.action === action.tool);
        const intent = createHealingIntent({
          event,
          classification,
          incidentId,
          decision,
          action,
          recall: recall.incidents,
          toolSuccessRate: history ? history.successRate : null,
          tool: this.deps.registry.get(action.tool)?.metadata,
          estimatedBlastRadius: this.deps.inventory.blastRadiusOf(event.component),
        });

        // Two policies proposing the same action yield one intent.
        if (seen.has(intent.intentId)) continue;
        seen.add(intent.intentId);
        intents.push(intent);
      }
    }
    return intents;
  }

  private async estimateImpact(
    event: TelemetryEvent,
    classification: Classification,
    degraded: DegradedStage[],
  ): Promise<BusinessImpact | null> {
    if (!this.deps.impact) return null;
    try {
      return await this.deps.impact({ event, classification });
    } catch (err) {
      logger.warn("Business impact unavailable", { Reason: getErrorMessage(err) });
      degraded.push("impact");
      return null;
    }
  }
}
