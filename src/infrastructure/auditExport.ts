/**
 * Audit log and intent persistence.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { serializeIntent } from "../intents/serialization";
import type { ExecutionRecord, HealingIntent } from "../types";

function writeFile(exportPath: string, contents: string): void {
  const target = path.resolve(process.cwd(), exportPath);
  mkdirSync(path.dirname(target), { recursive: true });
  writeFileSync(target, contents, "utf-8");
}

/** One JSON record per line, in sequence order */
export function formatAuditLog(records: readonly ExecutionRecord[]): string {
  return [...records]
    .sort((a, b) => a.seq - b.seq)
    .map((record) => `${JSON.stringify(record)}\n`)
    .join("");
}

/**
 * Write the audit log as NDJSON, replacing any previous export.
 * Returns the number of records written.
 */
export function exportAuditLog(
  exportPath: string,
  records: readonly ExecutionRecord[],
): number {
  writeFile(exportPath, formatAuditLog(records));
  return records.length;
}

/** Serialized intents, one per line, replacing any previous export */
export function exportIntents(
  exportPath: string,
  intents: readonly HealingIntent[],
): number {
  writeFile(exportPath, intents.map((intent) => `${serializeIntent(intent)}\n`).join(""));
  return intents.length;
}
