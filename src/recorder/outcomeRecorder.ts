import type { ExecutionObserver, ExecutionReport } from "../gateway/safetyGateway";
import type { ResilientMemory } from "../memory/resilientMemory";
import { getErrorMessage } from "../utils/helpers";
import { logger } from "../utils/logger";

export type ManualReport = {
  incidentId: string;
  actions: string[];
  success: boolean;
  durationMinutes: number;
  lessons?: string;
};

/**
 * Writes remediation outcomes back to incident memory. Dispatch never
 * blocks the caller and failures are logged, never thrown.
 */
export class OutcomeRecorder implements ExecutionObserver {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly memory: ResilientMemory) {}

  onExecution(report: ExecutionReport): void {
    this.record(report);
  }

  /** Record the outcome of a gateway execution */
  record(report: ExecutionReport): void {
    this.dispatch({
      incidentId: report.intent.incidentId,
      actions: [report.intent.tool],
      success: report.status === "COMPLETED",
      durationMinutes: report.durationMs / 60_000,
      lessons: report.error ?? report.result?.summary,
    });
  }

  /** Record a remediation performed outside the gateway, e.g. by an operator */
  reportManual(report: ManualReport): void {
    this.dispatch(report);
  }

  /** Wait for every write dispatched so far */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  private dispatch(report: ManualReport): void {
    const write = this.write(report);
    this.inFlight.add(write);
    void write.finally(() => this.inFlight.delete(write));
  }

  private async write(report: ManualReport): Promise<void> {
    try {
      const stored = await this.memory.storeOutcome(report);
      if (!stored.available) {
        logger.warn("Outcome not recorded", {
          Incident: report.incidentId,
          Reason: stored.reason,
        });
      }
    } catch (err) {
      logger.warn("Outcome not recorded", {
        Incident: report.incidentId,
        Reason: getErrorMessage(err),
      });
    }
  }
}
