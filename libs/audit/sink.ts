import type { RevealAuditRecordV1 } from "./schema.js";

/**
 * Append-only storage for audit records.
 */
export interface AuditSink {
    /** Hash of the newest record, or null for an empty log. */
    latestHash(): Promise<string | null>;
    append(record: RevealAuditRecordV1): Promise<void>;
    /** All records, oldest first. */
    readAll(): Promise<RevealAuditRecordV1[]>;
}

export class InMemoryAuditSink implements AuditSink {
    private readonly records: RevealAuditRecordV1[] = [];

    async latestHash(): Promise<string | null> {
        return this.records[this.records.length - 1]?.integrity.hash ?? null;
    }

    async append(record: RevealAuditRecordV1): Promise<void> {
        this.records.push(record);
    }

    async readAll(): Promise<RevealAuditRecordV1[]> {
        return [...this.records];
    }
}
