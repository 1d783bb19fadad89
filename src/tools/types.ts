import type { HealingIntent, JsonObject, SafetyLevel, ToolResult } from "../types";

export type ToolMetadata = Readonly<{
  name: string;
  description: string;
  safetyLevel: SafetyLevel;
  timeoutMs: number;
  requiredPermissions: readonly string[];
  /** Allowed while a business-hours restriction is active */
  safeForBusinessHours?: boolean;
}>;

export type ToolContext = Readonly<{
  intent: HealingIntent;
  component: string;
  parameters: Readonly<JsonObject>;
  /** Aborted when the gateway's execution timeout fires */
  signal: AbortSignal;
}>;

export type ToolValidation = { valid: true } | { valid: false; reason: string };

/**
 * Contract every remediation tool satisfies. The gateway is the only
 * caller of `execute`, and only after `validate` passes.
 */
export type Tool = {
  readonly metadata: ToolMetadata;
  validate(context: ToolContext): ToolValidation | Promise<ToolValidation>;
  execute(context: ToolContext): Promise<ToolResult>;
};

export const VALID: ToolValidation = Object.freeze({ valid: true });

export function invalid(reason: string): ToolValidation {
  return { valid: false, reason };
}
