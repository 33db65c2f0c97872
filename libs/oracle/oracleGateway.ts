/**
 * Outbound boundary to the decryption oracle.
 *
 * Issuing a request only enqueues a dispatch; delivery happens later through
 * the relayer, so core operations never wait on the oracle.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';
import type { Ciphertext, GroupId } from '../ledger/groupLedger.js';
import type { Clock } from '../clock/clock.js';

export interface DecryptionDispatch {
    readonly requestId: RequestId;
    readonly groupId: GroupId;
    readonly encryptedCount: Ciphertext;
    readonly encryptedSum: Ciphertext;
    readonly callbackTarget: string;
}

export interface OracleGateway {
    /**
     * Called before the request is recorded. Throwing aborts the reveal
     * request with no state change.
     */
    requestDecryption(dispatch: DecryptionDispatch): void;
}

export interface OutboxEntry {
    readonly dispatch: DecryptionDispatch;
    readonly enqueuedAt: number;
    attempts: number;
    lastError: string | null;
}

/**
 * FIFO outbox of pending oracle dispatches.
 */
export class OracleOutbox implements OracleGateway {
    private readonly queue: OutboxEntry[] = [];

    constructor(private readonly clock: Clock) { }

    requestDecryption(dispatch: DecryptionDispatch): void {
        this.queue.push({
            dispatch: Object.freeze({ ...dispatch }),
            enqueuedAt: this.clock.now(),
            attempts: 0,
            lastError: null
        });
    }

    /**
     * Removes and returns up to `max` entries from the head of the queue.
     */
    claimBatch(max: number): OutboxEntry[] {
        return this.queue.splice(0, Math.max(0, max));
    }

    requeue(entry: OutboxEntry): void {
        this.queue.push(entry);
    }

    size(): number {
        return this.queue.length;
    }

    peek(): readonly OutboxEntry[] {
        return this.queue;
    }
}
