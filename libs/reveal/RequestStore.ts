/**
 * Authoritative request store.
 *
 * Records are frozen snapshots replaced wholesale on each mutation. The only
 * mutations are the terminal transition and the refund mark, and both
 * re-check their guard conditions here so no caller can skip them.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';
import type { GroupId } from '../ledger/groupLedger.js';
import type { Identity } from '../auth/roleRegistry.js';
import { RevealError } from '../errors/RevealError.js';
import { DecryptionRequest, RevealedStatistic, TerminalStatus } from './types.js';

export interface NewRequest {
    readonly requestId: RequestId;
    readonly groupId: GroupId;
    readonly requester: Identity;
    readonly createdAt: number;
}

export class RequestStore {
    private readonly requests = new Map<RequestId, DecryptionRequest>();
    private readonly byGroup = new Map<GroupId, RequestId[]>();
    private readonly statistics = new Map<GroupId, RevealedStatistic>();

    create(input: NewRequest): DecryptionRequest {
        if (this.requests.has(input.requestId)) {
            throw new Error(`RequestStore invariant: duplicate request id ${input.requestId}`);
        }

        const record: DecryptionRequest = Object.freeze({
            ...input,
            status: 'PENDING',
            callbackConsumed: false,
            refundClaimed: false,
            finalizedAt: null,
            failureReason: null
        });

        this.requests.set(record.requestId, record);
        const history = this.byGroup.get(record.groupId);
        if (history) {
            history.push(record.requestId);
        } else {
            this.byGroup.set(record.groupId, [record.requestId]);
        }
        return record;
    }

    get(requestId: RequestId): DecryptionRequest | undefined {
        return this.requests.get(requestId);
    }

    require(requestId: RequestId): DecryptionRequest {
        const record = this.requests.get(requestId);
        if (!record) {
            throw new RevealError('REQUEST_NOT_FOUND', `Request ${requestId} does not exist`);
        }
        return record;
    }

    latestForGroup(groupId: GroupId): DecryptionRequest | undefined {
        return this.forGroup(groupId)[0];
    }

    /**
     * Every request issued for the group, newest first.
     */
    forGroup(groupId: GroupId): DecryptionRequest[] {
        return (this.byGroup.get(groupId) ?? [])
            .slice()
            .reverse()
            .flatMap(requestId => {
                const record = this.requests.get(requestId);
                return record ? [record] : [];
            });
    }

    /**
     * PENDING -> terminal. Throws ALREADY_FINALIZED if the request already left PENDING.
     */
    finalize(requestId: RequestId, status: TerminalStatus, at: number, failureReason: string | null = null): DecryptionRequest {
        const current = this.require(requestId);
        if (current.status !== 'PENDING' || current.callbackConsumed) {
            throw new RevealError('ALREADY_FINALIZED', `Request ${requestId} is already ${current.status}`);
        }

        const next: DecryptionRequest = Object.freeze({
            ...current,
            status,
            callbackConsumed: true,
            finalizedAt: at,
            failureReason: status === 'FAILED' ? failureReason : null
        });
        this.requests.set(requestId, next);
        return next;
    }

    markRefundClaimed(requestId: RequestId): DecryptionRequest {
        const current = this.require(requestId);
        if (current.refundClaimed) {
            throw new RevealError('ALREADY_CLAIMED', `Refund for request ${requestId} was already claimed`);
        }
        if (current.status !== 'FAILED' && current.status !== 'TIMED_OUT') {
            throw new RevealError('NOT_ELIGIBLE', `Request ${requestId} is ${current.status}`);
        }

        const next: DecryptionRequest = Object.freeze({ ...current, refundClaimed: true });
        this.requests.set(requestId, next);
        return next;
    }

    pending(): DecryptionRequest[] {
        return [...this.requests.values()].filter(r => r.status === 'PENDING');
    }

    size(): number {
        return this.requests.size;
    }

    /**
     * Stores the group's statistic unless one already exists. Returns the stored one.
     */
    putStatistic(statistic: RevealedStatistic): { stored: RevealedStatistic; created: boolean } {
        const existing = this.statistics.get(statistic.groupId);
        if (existing) {
            return { stored: existing, created: false };
        }
        const frozen = Object.freeze({ ...statistic });
        this.statistics.set(statistic.groupId, frozen);
        return { stored: frozen, created: true };
    }

    getStatistic(groupId: GroupId): RevealedStatistic | undefined {
        return this.statistics.get(groupId);
    }
}
