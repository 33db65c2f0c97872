/**
 * Group Ledger Boundary
 *
 * The reveal lifecycle reads encrypted aggregates through this interface and
 * mutates nothing but the pending pair. How aggregates are accumulated is the
 * ledger's concern.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';

export type GroupId = number;

/**
 * Opaque handle to an encrypted value. Never interpreted by this system.
 */
export type Ciphertext = string;

export interface GroupAggregateView {
    readonly groupId: GroupId;
    readonly encryptedCount: Ciphertext;
    readonly encryptedSum: Ciphertext;
    readonly visibleParticipationCount: number;
    readonly pendingRequestId: RequestId | null;
    readonly isPendingFlag: boolean;
}

export interface GroupLedger {
    /** Returns undefined for an unknown group. */
    getGroupAggregate(groupId: GroupId): GroupAggregateView | undefined;
    /** Throws REQUEST_ALREADY_PENDING if the group already has an outstanding request. */
    setGroupPending(groupId: GroupId, requestId: RequestId): void;
    /** Idempotent. */
    clearGroupPending(groupId: GroupId): void;
    getParticipationCount(groupId: GroupId): number;
}

/**
 * Homomorphic operations over ciphertext handles, supplied by the encryption layer.
 */
export interface EncryptedArithmetic {
    zero(): Ciphertext;
    encryptConstant(value: number): Ciphertext;
    add(a: Ciphertext, b: Ciphertext): Ciphertext;
}
