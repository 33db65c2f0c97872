/**
 * Decryption request lifecycle model.
 *
 * PENDING is the only non-terminal status. COMPLETED, FAILED and TIMED_OUT
 * never change once set, and records are never deleted: they are the audit
 * record of every reveal ever attempted.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';
import type { GroupId } from '../ledger/groupLedger.js';
import type { Identity } from '../auth/roleRegistry.js';

export type RequestStatus = 'PENDING' | 'COMPLETED' | 'FAILED' | 'TIMED_OUT';

export type TerminalStatus = Exclude<RequestStatus, 'PENDING'>;

export interface DecryptionRequest {
    readonly requestId: RequestId;
    readonly groupId: GroupId;
    readonly requester: Identity;
    /** Epoch ms at issuance */
    readonly createdAt: number;
    readonly status: RequestStatus;
    /** True once the single terminal transition happened */
    readonly callbackConsumed: boolean;
    readonly refundClaimed: boolean;
    readonly finalizedAt: number | null;
    /** Set only for FAILED */
    readonly failureReason: string | null;
}

/**
 * Written once per group, on the first COMPLETED reveal.
 */
export interface RevealedStatistic {
    readonly groupId: GroupId;
    readonly requestId: RequestId;
    readonly rawCount: number;
    readonly rawSum: number;
    /** Average scaled by the precision scale, noised for small samples */
    readonly obfuscatedAverage: number;
    readonly noiseEpoch: number;
    readonly revealedAt: number;
}

export interface RequestStatusView {
    readonly requestId: RequestId;
    readonly groupId: GroupId;
    readonly requester: Identity;
    readonly createdAt: number;
    readonly status: RequestStatus;
    readonly callbackConsumed: boolean;
    readonly refundClaimed: boolean;
    readonly isTimedOut: boolean;
}

export interface PublicStatistic {
    readonly obfuscatedAverage: number;
    readonly rawCount: number;
}

export type RevealOutcome =
    | {
        readonly status: 'COMPLETED';
        readonly requestId: RequestId;
        /** The group's permanent statistic */
        readonly statistic: RevealedStatistic;
        /** False when an earlier reveal already fixed the statistic */
        readonly firstReveal: boolean;
    }
    | {
        readonly status: 'FAILED';
        readonly requestId: RequestId;
        readonly reason: string;
    };

export function isTerminal(status: RequestStatus): status is TerminalStatus {
    return status !== 'PENDING';
}
