/**
 * Versioned JSON form of a HealingIntent, for handing intents to another
 * process or keeping them for later review.
 */

import { ValidationError } from "../errors";
import type { HealingIntent } from "../types";
import { getErrorMessage } from "../utils/helpers";
import { checkSchema } from "../utils/validateSchema";
import { computeIntentId, normalizeParameters } from "./healingIntent";
import intentSchema from "./intent.schema.json";

export const INTENT_SCHEMA_VERSION = 1;

type IntentEnvelope = {
  version: number;
  intent: HealingIntent;
};

export function serializeIntent(intent: HealingIntent): string {
  const envelope: IntentEnvelope = { version: INTENT_SCHEMA_VERSION, intent };
  return JSON.stringify(envelope);
}

/**
 * Parse and check a serialized intent. Throws ValidationError naming the
 * first offending field.
 */
export function deserializeIntent(text: string): HealingIntent {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError("(root)", `not valid JSON: ${getErrorMessage(err)}`);
  }

  const result = checkSchema<IntentEnvelope>(intentSchema, raw);
  if (!result.valid) {
    const [issue] = result.issues;
    throw new ValidationError(
      issue?.field ?? "(root)",
      issue?.message ?? "does not match the intent schema",
    );
  }

  const { version, intent } = result.data;
  if (version !== INTENT_SCHEMA_VERSION) {
    throw new ValidationError("version", `unsupported intent version ${version}`);
  }
  if (Number.isNaN(Date.parse(intent.detectedAt))) {
    throw new ValidationError("intent.detectedAt", "not a timestamp");
  }

  // The id hashes fingerprint, tool, component and parameters.
  const parameters = normalizeParameters(intent.parameters);
  const expected = computeIntentId(intent.fingerprint, intent.tool, intent.component, parameters);
  if (expected !== intent.intentId) {
    throw new ValidationError("intent.intentId", "does not match the intent's content");
  }

  return Object.freeze({
    ...intent,
    parameters,
    riskProfile: Object.freeze({ ...intent.riskProfile }),
    historicalContext: Object.freeze({ ...intent.historicalContext }),
  });
}
