import type { JsonObject } from "../types";

export function numberParam(
  params: Readonly<JsonObject>,
  key: string,
  fallback: number,
): number {
  const value = params[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

export function stringParam(
  params: Readonly<JsonObject>,
  key: string,
): string | null {
  const value = params[key];
  return typeof value === "string" && value.trim() ? value.trim() : null;
}
