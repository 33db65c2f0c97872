import crypto from "crypto";
import { logger } from "../logging/logger.js";
import type { RevealEvent, RevealEventBus } from "../reveal/events.js";
import { computeRecordHash } from "./integrity.js";
import { GENESIS_HASH, RevealAuditRecordV1, UnsignedAuditRecord } from "./schema.js";
import type { AuditSink } from "./sink.js";

/**
 * Hash-chained audit trail of reveal lifecycle events.
 * Writes are serialized so the chain follows emission order. A failed write
 * does not advance the chain; the next record links to the last stored one.
 */
export class RevealAuditTrail {
    private lastHash: string | null = null;
    private tail: Promise<void> = Promise.resolve();

    constructor(private readonly sink: AuditSink) { }

    /**
     * Subscribes to every event on the bus. Returns the unsubscribe function.
     */
    attach(events: RevealEventBus): () => void {
        return events.onAny(event => this.record(event));
    }

    record(event: RevealEvent): Promise<void> {
        const next = this.tail
            .catch(() => undefined)
            .then(() => this.write(event));
        this.tail = next;
        return next;
    }

    /**
     * Resolves once every queued write has settled.
     */
    async flush(): Promise<void> {
        await this.tail.catch(() => undefined);
    }

    private async ensureChainInitialized(): Promise<string> {
        if (this.lastHash !== null) return this.lastHash;

        try {
            this.lastHash = (await this.sink.latestHash()) ?? GENESIS_HASH;
            return this.lastHash;
        } catch (error) {
            logger.error({ error }, "Failed to initialize audit chain from sink");
            // Fail closed: no blind writes onto an unknown chain head
            throw new Error("Audit substrate unavailable - Chain initialization failed.");
        }
    }

    private async write(event: RevealEvent): Promise<void> {
        const prevHash = await this.ensureChainInitialized();
        const unsigned = toUnsignedRecord(event);
        const hash = computeRecordHash(unsigned, prevHash);
        const signed: RevealAuditRecordV1 = { ...unsigned, integrity: { prevHash, hash } };

        try {
            await this.sink.append(signed);
            this.lastHash = hash;
            logger.debug({
                auditEvent: event.type,
                requestId: unsigned.requestId,
                integrityHash: hash
            }, "Audit record committed");
        } catch (error) {
            logger.error({ error, requestId: unsigned.requestId }, "CRITICAL: Audit log write failed.");
            throw new Error("Audit log failure - record not persisted.");
        }
    }
}

function toUnsignedRecord(event: RevealEvent): UnsignedAuditRecord {
    const base = {
        eventId: crypto.randomUUID(),
        eventType: event.type,
        timestamp: new Date(event.emittedAt).toISOString(),
    };

    switch (event.type) {
        case 'RevealRequested':
            return { ...base, requestId: event.payload.requestId, groupId: event.payload.groupId, actor: event.payload.requester, details: {} };
        case 'RevealCompleted':
            return { ...base, requestId: event.payload.requestId, groupId: event.payload.groupId, actor: null, details: { count: event.payload.count, sum: event.payload.sum } };
        case 'RevealFailed':
            return { ...base, requestId: event.payload.requestId, groupId: event.payload.groupId, actor: null, details: { reason: event.payload.reason } };
        case 'RevealTimedOut':
            return { ...base, requestId: event.payload.requestId, groupId: event.payload.groupId, actor: null, details: {} };
        case 'RefundClaimed':
            return { ...base, requestId: event.payload.requestId, groupId: event.payload.groupId, actor: event.payload.claimant, details: {} };
    }
}
