import type { ExecutionRecord } from "../types";

export type AuditEntry = Omit<ExecutionRecord, "seq" | "recordedAt">;

/**
 * Append-only gateway audit log. Records are frozen and numbered in
 * append order, which is the order decisions complete.
 */
export class AuditTrail {
  private readonly entries: ExecutionRecord[] = [];
  // intent id -> seq of its latest record other than a duplicate
  private readonly decided = new Map<string, number>();
  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  append(entry: AuditEntry): ExecutionRecord {
    const record: ExecutionRecord = Object.freeze({
      ...entry,
      validation: Object.freeze({ ...entry.validation }),
      ...(entry.result ? { result: Object.freeze({ ...entry.result }) } : {}),
      seq: ++this.seq,
      recordedAt: this.now().toISOString(),
    });
    this.entries.push(record);
    if (record.duplicateOf === undefined) this.decided.set(record.intentId, record.seq);
    return record;
  }

  /** The latest record for an intent, skipping duplicate submissions */
  latestFor(intentId: string): ExecutionRecord | undefined {
    const seq = this.decided.get(intentId);
    return seq === undefined ? undefined : this.entries[seq - 1];
  }

  records(): readonly ExecutionRecord[] {
    return Object.freeze([...this.entries]);
  }

  /** Records appended after the given sequence number */
  since(seq: number): readonly ExecutionRecord[] {
    return Object.freeze(this.entries.filter((record) => record.seq > seq));
  }

  get size(): number {
    return this.entries.length;
  }
}
