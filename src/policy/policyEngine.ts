/**
 * Deterministic, priority-ordered healing policies with per-component
 * cooldowns and rolling hourly rate limits.
 */

import { PolicyEvaluationError } from "../errors";
import { normalizeParameters } from "../intents/healingIntent";
import {
  type ClassificationLevel,
  type Classification,
  type ComparisonOperator,
  type HealingPolicy,
  type JsonObject,
  type PolicyAction,
  type PolicyCondition,
  type PolicyDecision,
  type TelemetryEvent,
  CLASSIFICATION_ORDER,
  METRIC_NAMES,
  metricValue,
} from "../types";
import { throwIfAborted } from "../utils/helpers";
import { logger } from "../utils/logger";
import { LRUMap } from "../utils/lru";
import { KeyedMutex } from "../utils/mutex";

export type PolicyConditionInput = {
  metric: string;
  operator: string;
  threshold: number;
};

export type PolicyActionInput =
  | string
  | { tool: string; parameters?: JsonObject; blastRadius?: number | null };

/** Policy as written in configuration. Omitted fields take defaults. */
export type HealingPolicyInput = {
  name: string;
  conditions: readonly PolicyConditionInput[];
  actions: readonly PolicyActionInput[];
  priority: number;
  cooldownSeconds?: number;
  maxExecutionsPerHour?: number;
  terminal?: boolean;
  enabled?: boolean;
  minClassification?: ClassificationLevel;
};

export type PolicyEngineOptions = {
  maxTrackedComponents: number;
  now: () => number;
};

/** Policies that would fire for one event, not yet recorded as fired */
export type PolicyPlan = {
  decisions: readonly PolicyDecision[];
  /**
   * Select again under the component lock against the current firing
   * history, record what fires and return it. A commit for the same
   * component since planning may have started a cooldown.
   */
  commit(): Promise<PolicyDecision[]>;
};

type FiringHistory = {
  lastFiredAt: number;
  firings: number[];
};

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_COOLDOWN_SECONDS = 300;
const DEFAULT_MAX_PER_HOUR = 10;

const OPERATORS: readonly ComparisonOperator[] = [">", "<", ">=", "<=", "==", "!="];

function compare(value: number, operator: ComparisonOperator, threshold: number): boolean {
  switch (operator) {
    case ">":
      return value > threshold;
    case "<":
      return value < threshold;
    case ">=":
      return value >= threshold;
    case "<=":
      return value <= threshold;
    case "==":
      return value === threshold;
    case "!=":
      return value !== threshold;
  }
}

function rank(level: ClassificationLevel): number {
  return CLASSIFICATION_ORDER.indexOf(level);
}

function compileCondition(policy: string, input: PolicyConditionInput): PolicyCondition {
  const metric = METRIC_NAMES.find((name) => name === input.metric);
  if (!metric) {
    throw new PolicyEvaluationError(policy, `unknown metric "${input.metric}"`);
  }
  const operator = OPERATORS.find((op) => op === input.operator);
  if (!operator) {
    throw new PolicyEvaluationError(policy, `unknown operator "${input.operator}"`);
  }
  if (typeof input.threshold !== "number" || !Number.isFinite(input.threshold)) {
    throw new PolicyEvaluationError(policy, `threshold for ${metric} is not a finite number`);
  }
  return Object.freeze({ metric, operator, threshold: input.threshold });
}

function compileAction(input: PolicyActionInput): PolicyAction {
  if (typeof input === "string") {
    return Object.freeze({ tool: input, parameters: Object.freeze({}), blastRadius: null });
  }
  return Object.freeze({
    tool: input.tool,
    parameters: normalizeParameters(input.parameters ?? {}),
    blastRadius: input.blastRadius ?? null,
  });
}

/**
 * Validate and freeze a configured policy. Throws PolicyEvaluationError
 * when the policy cannot be evaluated.
 */
export function compilePolicy(input: HealingPolicyInput): HealingPolicy {
  const conditions = input.conditions.map((c) => compileCondition(input.name, c));
  if (conditions.length === 0) {
    throw new PolicyEvaluationError(input.name, "no conditions");
  }
  const maxExecutionsPerHour = input.maxExecutionsPerHour ?? DEFAULT_MAX_PER_HOUR;
  if (!Number.isInteger(maxExecutionsPerHour) || maxExecutionsPerHour < 0) {
    throw new PolicyEvaluationError(input.name, "maxExecutionsPerHour must be a non-negative integer");
  }
  const cooldownSeconds = input.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
  if (!Number.isFinite(cooldownSeconds) || cooldownSeconds < 0) {
    throw new PolicyEvaluationError(input.name, "cooldownSeconds must be a non-negative number");
  }

  return Object.freeze({
    name: input.name,
    conditions: Object.freeze(conditions),
    actions: Object.freeze(input.actions.map(compileAction)),
    priority: input.priority,
    cooldownSeconds,
    maxExecutionsPerHour,
    terminal: input.terminal ?? false,
    enabled: input.enabled ?? true,
    minClassification: input.minClassification ?? "DEGRADING",
  });
}

export class PolicyEngine {
  private readonly ordered: readonly HealingPolicy[];
  private readonly options: PolicyEngineOptions;
  // component -> policy name -> firing history
  private readonly tracking: LRUMap<string, Map<string, FiringHistory>>;
  private readonly locks = new KeyedMutex();

  constructor(
    policies: readonly HealingPolicyInput[],
    options: Partial<PolicyEngineOptions> = {},
  ) {
    this.options = { maxTrackedComponents: 100, now: () => Date.now(), ...options };
    this.tracking = new LRUMap(this.options.maxTrackedComponents);

    const compiled: HealingPolicy[] = [];
    for (const input of policies) {
      try {
        compiled.push(compilePolicy(input));
      } catch (err) {
        if (!(err instanceof PolicyEvaluationError)) throw err;
        logger.warn("Policy skipped", { Policy: err.policy, Reason: err.reason });
      }
    }
    // Stable sort: equal priorities keep configuration order.
    this.ordered = Object.freeze(compiled.sort((a, b) => a.priority - b.priority));
  }

  get trackedComponents(): number {
    return this.tracking.size;
  }

  /** The loaded policies, compiled and in evaluation order */
  get policies(): readonly HealingPolicy[] {
    return this.ordered;
  }

  /** Plan and commit in one step */
  async evaluate(
    event: TelemetryEvent,
    classification: Classification,
    signal?: AbortSignal,
  ): Promise<PolicyDecision[]> {
    const plan = await this.plan(event, classification, signal);
    throwIfAborted(signal, "policy evaluation");
    return plan.commit();
  }

  /**
   * Policies that fire for this event, in priority order. Nothing is
   * recorded until the returned plan is committed, so an abandoned plan
   * leaves cooldowns and rate counters untouched.
   */
  async plan(
    event: TelemetryEvent,
    classification: Classification,
    signal?: AbortSignal,
  ): Promise<PolicyPlan> {
    throwIfAborted(signal, "policy evaluation");
    if (classification.level === "NORMAL") {
      return { decisions: [], commit: async () => [] };
    }

    const decisions = await this.locks.runExclusive(event.component, () =>
      this.select(event, classification, this.options.now()),
    );
    throwIfAborted(signal, "policy evaluation");

    return {
      decisions,
      commit: () =>
        this.locks.runExclusive(event.component, () => {
          const now = this.options.now();
          const fired = this.select(event, classification, now);
          if (fired.length > 0) {
            this.record(event.component, fired.map((d) => d.policy), now);
          }
          return fired;
        }),
    };
  }

  private select(
    event: TelemetryEvent,
    classification: Classification,
    now: number,
  ): PolicyDecision[] {
    const history = this.tracking.peek(event.component);
    const decisions: PolicyDecision[] = [];

    for (const policy of this.ordered) {
      if (!policy.enabled) continue;
      if (rank(classification.level) < rank(policy.minClassification)) continue;
      if (!this.matches(policy, event)) continue;
      if (!this.admits(policy, history?.get(policy.name), now)) continue;

      decisions.push(
        Object.freeze({
          policy: policy.name,
          priority: policy.priority,
          conditions: policy.conditions,
          actions: policy.actions,
        }),
      );
      if (policy.terminal) break;
    }
    return decisions;
  }

  private matches(policy: HealingPolicy, event: TelemetryEvent): boolean {
    return policy.conditions.every((condition) => {
      const value = metricValue(event, condition.metric);
      return value !== null && compare(value, condition.operator, condition.threshold);
    });
  }

  private admits(
    policy: HealingPolicy,
    history: FiringHistory | undefined,
    now: number,
  ): boolean {
    if (!history) return policy.maxExecutionsPerHour > 0;
    if (now - history.lastFiredAt < policy.cooldownSeconds * 1000) return false;
    const recent = history.firings.filter((t) => t > now - HOUR_MS);
    return recent.length < policy.maxExecutionsPerHour;
  }

  private record(component: string, fired: readonly string[], now: number): void {
    const history = this.tracking.get(component) ?? new Map<string, FiringHistory>();
    for (const name of fired) {
      const previous = history.get(name);
      history.set(name, {
        lastFiredAt: now,
        firings: [...(previous?.firings ?? []).filter((t) => t > now - HOUR_MS), now],
      });
    }
    this.tracking.set(component, history);
  }
}
