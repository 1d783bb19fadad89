import Ajv, { type ErrorObject, type SchemaObject } from "ajv";

// Ajv caches compiled validators by schema object, so compiling per call is cheap.
const ajv = new Ajv({ allErrors: true, strict: false });

export type SchemaIssue = {
  /** Dotted path of the offending property, or "(root)" */
  field: string;
  message: string;
};

export type SchemaCheck<T> =
  | { valid: true; data: T }
  | { valid: false; issues: SchemaIssue[] };

function fieldOf(error: ErrorObject): string {
  const segments = error.instancePath.split("/").filter(Boolean);
  const params: Record<string, unknown> = error.params;
  if (error.keyword === "required" && typeof params.missingProperty === "string") {
    segments.push(params.missingProperty);
  }
  if (
    error.keyword === "additionalProperties" &&
    typeof params.additionalProperty === "string"
  ) {
    segments.push(params.additionalProperty);
  }
  return segments.length > 0 ? segments.join(".") : "(root)";
}

/**
 * Check data against a JSON schema and report every issue by field.
 */
export function checkSchema<T>(schema: SchemaObject, data: unknown): SchemaCheck<T> {
  const validate = ajv.compile<T>(schema);
  if (validate(data)) {
    return { valid: true, data };
  }
  return {
    valid: false,
    issues: (validate.errors ?? []).map((error) => ({
      field: fieldOf(error),
      message: error.message ?? error.keyword,
    })),
  };
}
