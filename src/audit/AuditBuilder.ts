import type { AuditRecord, ErrorKind, OutcomeSummary } from "../domain/types.js";
import { redact } from "../security/pii.js";

/**
 * Provenance for one orchestrator call: which sources were consulted and a
 * summary of each call. Summaries hold booleans, counts and error kinds only;
 * response bodies and query text never go in.
 */
export class AuditBuilder {
  private readonly sources = new Set<string>();
  private readonly rawCalls = new Map<string, OutcomeSummary>();

  addSource(tag: string): this {
    this.sources.add(tag);
    return this;
  }

  recordCall(name: string, summary: OutcomeSummary): this {
    this.rawCalls.set(name, { ...summary });
    return this;
  }

  /** Marks a degraded call under `<name>_error`. */
  recordDegraded(name: string, kind: ErrorKind): this {
    return this.recordCall(`${name}_error`, { degraded: true, kind });
  }

  toRecord(): AuditRecord {
    return {
      sources: [...this.sources],
      rawCalls: Object.fromEntries(this.rawCalls)
    };
  }

  /** Same record, with every source tag redacted; the only form handed to loggers. */
  toLogView(): AuditRecord {
    return toLogView(this.toRecord());
  }
}

export function toLogView(record: AuditRecord): AuditRecord {
  return {
    sources: record.sources.map(redact),
    rawCalls: Object.fromEntries(
      Object.entries(record.rawCalls).map(([k, v]) => [redact(k), { ...v }])
    )
  };
}

export function cacheHitAudit(): AuditRecord {
  return new AuditBuilder().addSource("cache").recordCall("cache", { hit: true }).toRecord();
}
