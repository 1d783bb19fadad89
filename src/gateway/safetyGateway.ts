/**
 * Safety gateway: the only path from a HealingIntent to an external effect.
 *
 * RECEIVED → VALIDATING → {DENIED | PENDING_APPROVAL | APPROVED}
 *          → {ADVISORY_ONLY | EXECUTING → COMPLETED | FAILED}
 *
 * Checks and the decision for one tool+component pair run under a keyed
 * lock, so two intents for the same pair cannot both pass the cooldown.
 */

import { randomUUID } from "crypto";
import { GatewayDeniedError, ToolExecutionError } from "../errors";
import type { Inventory } from "../infrastructure/compose";
import { CircuitBreaker, type CircuitBreakerOptions } from "../resilience/circuitBreaker";
import type { Tool, ToolContext } from "../tools/types";
import type { ToolRegistry } from "../tools/registry";
import type {
  ExecutionMode,
  ExecutionRecord,
  GatewayCheck,
  GatewayResponse,
  GatewayResult,
  GatewayState,
  GatewayStatus,
  HealingIntent,
  ToolResult,
  ValidationOutcome,
} from "../types";
import { getErrorMessage, withTimeout } from "../utils/helpers";
import { LRUMap } from "../utils/lru";
import { KeyedMutex } from "../utils/mutex";
import { AuditTrail, type AuditEntry } from "./auditTrail";

/** Externally verified entitlement. Never derived from configuration. */
export type Capability = Readonly<{
  executionPermitted: boolean;
  approvalWorkflows: boolean;
  maxBlastRadius: number;
}>;

export type BusinessHours = {
  /** Days of week the window applies to, 0 = Sunday */
  days: number[];
  startHour: number;
  endHour: number;
  utcOffsetMinutes: number;
};

export type GatewayConfig = {
  blacklist: string[];
  maxBlastRadius: number;
  businessHours: BusinessHours | null;
  cooldownSeconds: number;
  approvalTimeoutSeconds: number;
  /** Interval of the background expiry sweep; null disables it */
  approvalSweepMs: number | null;
  /** Settled responses cached for duplicates; older ids are found in the audit trail */
  maxTrackedIntents: number;
  breaker: Partial<Omit<CircuitBreakerOptions, "now">>;
};

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  blacklist: [],
  maxBlastRadius: 3,
  businessHours: null,
  cooldownSeconds: 300,
  approvalTimeoutSeconds: 900,
  approvalSweepMs: null,
  maxTrackedIntents: 10_000,
  breaker: {},
};

export type ExecutionReport = Readonly<{
  intent: HealingIntent;
  status: "COMPLETED" | "FAILED";
  durationMs: number;
  result: ToolResult | null;
  error: string | null;
}>;

export type ExecutionObserver = {
  onExecution(report: ExecutionReport): void;
};

export type PendingApproval = Readonly<{
  approvalId: string;
  intent: HealingIntent;
  mode: ExecutionMode;
  submittedAt: string;
  expiresAt: number;
}>;

export type SafetyGatewayDeps = {
  registry: ToolRegistry;
  capability: Capability;
  /** Blast radius from the service inventory; an intent may not report less */
  inventory?: Pick<Inventory, "blastRadiusOf">;
  audit?: AuditTrail;
  observer?: ExecutionObserver;
  now?: () => number;
};

type Settled = {
  response: GatewayResponse;
  validation: ValidationOutcome;
};

const PASSED: ValidationOutcome = Object.freeze({ passed: true });

function denied(check: GatewayCheck, reason: string): ValidationOutcome {
  return Object.freeze({ passed: false, check, reason });
}

export function isGatewayStatus(state: GatewayState): state is GatewayStatus {
  switch (state) {
    case "DENIED":
    case "PENDING_APPROVAL":
    case "ADVISORY_ONLY":
    case "COMPLETED":
    case "FAILED":
      return true;
    default:
      return false;
  }
}

export function isBusinessHours(at: number, window: BusinessHours): boolean {
  const local = new Date(at + window.utcOffsetMinutes * 60_000);
  const hour = local.getUTCHours();
  return (
    window.days.includes(local.getUTCDay()) &&
    hour >= window.startHour &&
    hour < window.endHour
  );
}

export class SafetyGateway {
  readonly audit: AuditTrail;
  private readonly config: GatewayConfig;
  private readonly capability: Capability;
  private readonly registry: ToolRegistry;
  private readonly observer: ExecutionObserver | undefined;
  private readonly inventory: Pick<Inventory, "blastRadiusOf"> | undefined;
  private readonly now: () => number;

  private readonly settled: LRUMap<string, Promise<Settled>>;
  private readonly approvals = new Map<string, PendingApproval>();
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly lastExecution = new Map<string, number>();
  private readonly locks = new KeyedMutex();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(deps: SafetyGatewayDeps, config: Partial<GatewayConfig> = {}) {
    this.config = { ...DEFAULT_GATEWAY_CONFIG, ...config };
    this.capability = Object.freeze({ ...deps.capability });
    this.registry = deps.registry;
    this.observer = deps.observer;
    this.inventory = deps.inventory;
    this.now = deps.now ?? (() => Date.now());
    this.audit = deps.audit ?? new AuditTrail(() => new Date(this.now()));
    this.settled = new LRUMap(this.config.maxTrackedIntents);

    if (this.config.approvalSweepMs !== null) {
      this.sweepTimer = setInterval(
        () => this.expireStaleApprovals(),
        this.config.approvalSweepMs,
      );
      this.sweepTimer.unref();
    }
  }

  /**
   * Submit an intent. A repeated intent id returns the first response,
   * marked as a duplicate, and is never executed again.
   */
  async submit(intent: HealingIntent, mode: ExecutionMode): Promise<GatewayResponse> {
    const previous = this.settled.get(intent.intentId) ?? this.fromAudit(intent);
    if (previous) {
      return this.duplicate(intent, mode, previous);
    }

    const work = this.process(intent, mode);
    this.settled.set(intent.intentId, work);
    return (await work).response;
  }

  /** Approve a pending request and execute it */
  async approve(approvalId: string, approver: string): Promise<GatewayResponse> {
    this.expireStaleApprovals();
    const pending = this.takeApproval(approvalId);

    const work = this.decide(pending.intent, pending.mode, pending.submittedAt, {
      approvalId,
      approver,
    });
    this.settled.set(pending.intent.intentId, work);
    return (await work).response;
  }

  reject(approvalId: string, reason: string): GatewayResponse {
    this.expireStaleApprovals();
    const pending = this.takeApproval(approvalId);
    return this.closeApproval(pending, `Rejected: ${reason}`);
  }

  /** Auto-reject approvals past their expiry. Returns how many expired. */
  expireStaleApprovals(): number {
    const now = this.now();
    let expired = 0;
    for (const pending of [...this.approvals.values()]) {
      if (now >= pending.expiresAt) {
        this.approvals.delete(pending.approvalId);
        this.closeApproval(pending, "Approval expired");
        expired++;
      }
    }
    return expired;
  }

  pendingApprovals(): PendingApproval[] {
    this.expireStaleApprovals();
    return [...this.approvals.values()];
  }

  breakerFor(tool: string): CircuitBreaker {
    let breaker = this.breakers.get(tool);
    if (!breaker) {
      breaker = new CircuitBreaker(`tool:${tool}`, { ...this.config.breaker, now: this.now });
      this.breakers.set(tool, breaker);
    }
    return breaker;
  }

  dispose(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private async process(intent: HealingIntent, mode: ExecutionMode): Promise<Settled> {
    this.expireStaleApprovals();
    return this.decide(intent, mode, new Date(this.now()).toISOString(), null);
  }

  /**
   * Validate and settle one request. Everything up to and including the
   * decision record and the cooldown runs under the tool+component lock.
   */
  private async decide(
    intent: HealingIntent,
    mode: ExecutionMode,
    submittedAt: string,
    approval: { approvalId: string; approver: string } | null,
  ): Promise<Settled> {
    const tool = this.registry.get(intent.tool);
    const base = {
      intentId: intent.intentId,
      tool: intent.tool,
      component: intent.component,
      justification: intent.justification,
      mode,
      submittedAt,
      ...(approval ?? {}),
    };

    const decision = await this.locks.runExclusive(
      `${intent.tool}:${intent.component}`,
      async () => {
        const validation = await this.validate(intent, tool);
        if (!validation.passed || !tool) {
          const record = this.append({ ...base, validation, status: "DENIED" });
          return { validation, record, execute: null };
        }

        const effective = this.effectiveMode(mode);
        if (effective === "ADVISORY") {
          const record = this.append({
            ...base,
            validation,
            status: "ADVISORY_ONLY",
            result: { wouldExecute: true },
          });
          return { validation, record, execute: null };
        }

        if (effective === "APPROVAL" && !approval) {
          const approvalId = `apr_${randomUUID()}`;
          this.approvals.set(
            approvalId,
            Object.freeze({
              approvalId,
              intent,
              mode,
              submittedAt,
              expiresAt: this.now() + this.config.approvalTimeoutSeconds * 1000,
            }),
          );
          const record = this.append({ ...base, validation, status: "PENDING_APPROVAL", approvalId });
          return { validation, record, execute: null };
        }

        // Cooldown starts when execution is decided, inside the lock.
        this.lastExecution.set(this.cooldownKey(intent), this.now());
        const record = this.append({ ...base, validation, status: "APPROVED" });
        return { validation, record, execute: tool };
      },
    );

    const { validation, record } = decision;
    if (!decision.execute) {
      return { validation, response: this.respond(intent, record) };
    }

    const finalRecord = await this.execute(intent, decision.execute, base);
    return { validation, response: this.respond(intent, finalRecord) };
  }

  private async validate(
    intent: HealingIntent,
    tool: Tool | undefined,
  ): Promise<ValidationOutcome> {
    if (!tool) {
      return denied("unknown_tool", `Unknown tool: ${intent.tool}`);
    }
    if (this.config.blacklist.includes(tool.metadata.name)) {
      return denied("blacklist", `${tool.metadata.name} is blacklisted`);
    }

    const limit = Math.min(this.config.maxBlastRadius, this.capability.maxBlastRadius);
    const blastRadius = Math.max(
      intent.riskProfile.blastRadius,
      this.inventory?.blastRadiusOf(intent.component) ?? 0,
    );
    if (blastRadius > limit) {
      return denied("blast_radius", `Blast radius ${blastRadius} exceeds limit ${limit}`);
    }

    // Only the registered tool says what is safe in business hours.
    const hours = this.config.businessHours;
    if (hours && isBusinessHours(this.now(), hours) && !tool.metadata.safeForBusinessHours) {
      return denied("business_hours", `${tool.metadata.name} is not allowed during business hours`);
    }

    if (this.breakerFor(tool.metadata.name).state === "OPEN") {
      return denied("circuit_breaker", `Circuit for ${tool.metadata.name} is open`);
    }

    const last = this.lastExecution.get(this.cooldownKey(intent));
    const cooldownMs = this.config.cooldownSeconds * 1000;
    if (last !== undefined && this.now() - last < cooldownMs) {
      const remaining = Math.ceil((cooldownMs - (this.now() - last)) / 1000);
      return denied(
        "cooldown",
        `${tool.metadata.name} on ${intent.component} is cooling down for ${remaining}s`,
      );
    }

    try {
      const result = await tool.validate(this.contextFor(intent, new AbortController().signal));
      return result.valid ? PASSED : denied("tool_precondition", result.reason);
    } catch (err) {
      return denied("tool_precondition", `Precondition check failed: ${getErrorMessage(err)}`);
    }
  }

  private effectiveMode(mode: ExecutionMode): ExecutionMode {
    if (this.capability.executionPermitted !== true) return "ADVISORY";
    if (mode === "APPROVAL" && !this.capability.approvalWorkflows) return "ADVISORY";
    return mode;
  }

  private async execute(
    intent: HealingIntent,
    tool: Tool,
    base: Omit<AuditEntry, "validation" | "status">,
  ): Promise<ExecutionRecord> {
    const { name, timeoutMs } = tool.metadata;
    const started = this.now();
    const controller = new AbortController();
    let result: ToolResult | null = null;
    let error: string | null = null;

    try {
      result = await this.breakerFor(name).call(async () => {
        const outcome = await withTimeout(
          tool.execute(this.contextFor(intent, controller.signal)),
          timeoutMs,
          name,
          () => controller.abort(),
        );
        if (!outcome.success) throw new ToolExecutionError(name, outcome.summary);
        return outcome;
      });
    } catch (err) {
      const failure =
        err instanceof ToolExecutionError
          ? err
          : new ToolExecutionError(name, getErrorMessage(err));
      error = failure.message;
    }

    const durationMs = this.now() - started;
    const status = result ? "COMPLETED" : "FAILED";
    const gatewayResult: GatewayResult = result
      ? { tool: result, durationMs }
      : { durationMs, error: error ?? "unknown failure" };

    const record = this.append({
      ...base,
      validation: PASSED,
      status,
      result: gatewayResult,
    });

    this.observer?.onExecution(
      Object.freeze({ intent, status, durationMs, result, error }),
    );

    return record;
  }

  private duplicate(
    intent: HealingIntent,
    mode: ExecutionMode,
    previous: Promise<Settled>,
  ): Promise<GatewayResponse> {
    return previous.then(({ response, validation }) => {
      this.append({
        intentId: intent.intentId,
        tool: intent.tool,
        component: intent.component,
        justification: intent.justification,
        mode,
        validation,
        status: response.status,
        duplicateOf: response.auditSeq,
        submittedAt: new Date(this.now()).toISOString(),
      });
      return Object.freeze({ ...response, duplicate: true });
    });
  }

  // The settled cache is bounded; the audit trail holds every intent id.
  private fromAudit(intent: HealingIntent): Promise<Settled> | undefined {
    const record = this.audit.latestFor(intent.intentId);
    if (!record) return undefined;

    if (isGatewayStatus(record.status)) {
      return Promise.resolve({
        response: this.respond(intent, record),
        validation: record.validation,
      });
    }
    const response: GatewayResponse = Object.freeze({
      status: "DENIED",
      intentId: intent.intentId,
      duplicate: false,
      auditSeq: record.seq,
      reason: `Intent ${intent.intentId} is still ${record.status.toLowerCase()}`,
    });
    return Promise.resolve({ response, validation: record.validation });
  }

  private takeApproval(approvalId: string): PendingApproval {
    const pending = this.approvals.get(approvalId);
    if (!pending) {
      throw new GatewayDeniedError("approval", `Unknown or expired approval: ${approvalId}`);
    }
    this.approvals.delete(approvalId);
    return pending;
  }

  private closeApproval(pending: PendingApproval, reason: string): GatewayResponse {
    const validation = denied("approval", reason);
    const record = this.append({
      intentId: pending.intent.intentId,
      tool: pending.intent.tool,
      component: pending.intent.component,
      justification: pending.intent.justification,
      mode: pending.mode,
      validation,
      status: "DENIED",
      approvalId: pending.approvalId,
      submittedAt: pending.submittedAt,
    });
    const response = this.respond(pending.intent, record);
    this.settled.set(pending.intent.intentId, Promise.resolve({ response, validation }));
    return response;
  }

  private append(entry: AuditEntry): ExecutionRecord {
    return this.audit.append(entry);
  }

  private respond(
    intent: HealingIntent,
    record: ExecutionRecord,
  ): GatewayResponse {
    const status = this.settledStatus(record.status);
    const reason = record.result?.error ?? record.validation.reason;
    return Object.freeze({
      status,
      intentId: intent.intentId,
      duplicate: false,
      auditSeq: record.seq,
      ...(reason ? { reason } : {}),
      ...(record.approvalId ? { approvalId: record.approvalId } : {}),
      ...(record.result ? { result: record.result } : {}),
    });
  }

  private settledStatus(state: ExecutionRecord["status"]): GatewayStatus {
    if (isGatewayStatus(state)) return state;
    throw new Error(`Gateway state ${state} is not a settled status`);
  }

  private contextFor(intent: HealingIntent, signal: AbortSignal): ToolContext {
    return {
      intent,
      component: intent.component,
      parameters: intent.parameters,
      signal,
    };
  }

  private cooldownKey(intent: HealingIntent): string {
    return `${intent.tool}:${intent.component}`;
  }
}
