import type { ToolResult } from "../types";
import { logger } from "../utils/logger";
import { stringParam } from "./params";
import { type Tool, type ToolContext, type ToolMetadata, VALID } from "./types";

export type OperatorAlert = {
  component: string;
  channel: string;
  summary: string;
  intentId: string;
};

export type AlertSink = (alert: OperatorAlert) => Promise<void>;

async function logAlert(alert: OperatorAlert): Promise<void> {
  logger.warn("Operator alert", {
    Channel: alert.channel,
    Component: alert.component,
    Summary: alert.summary,
    Intent: alert.intentId,
  });
}

/** Notify the on-call team. No effect on the service itself. */
export class AlertTeamTool implements Tool {
  readonly metadata: ToolMetadata = Object.freeze({
    name: "alert_team",
    description: "Notify the on-call team about the incident",
    safetyLevel: "low",
    timeoutMs: 10_000,
    requiredPermissions: [],
    safeForBusinessHours: true,
  });

  constructor(private readonly sink: AlertSink = logAlert) {}

  validate() {
    return VALID;
  }

  async execute(context: ToolContext): Promise<ToolResult> {
    const channel = stringParam(context.parameters, "channel") ?? "on-call";
    await this.sink({
      component: context.component,
      channel,
      summary: context.intent.justification,
      intentId: context.intent.intentId,
    });
    return { success: true, summary: `Alerted ${channel} about ${context.component}` };
  }
}
