/**
 * Timeout & Refund Controller
 *
 * Liveness: anyone may force a stale PENDING request to TIMED_OUT once the
 * decryption timeout has elapsed. Compensation: the requester may claim one
 * refund per FAILED or TIMED_OUT request inside its refund window, even after
 * later requests for the same group.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';
import type { GroupId } from '../ledger/groupLedger.js';
import type { Identity } from '../auth/roleRegistry.js';
import { RevealError } from '../errors/RevealError.js';
import { getComponentLogger } from '../logging/logger.js';
import type { RevealContext } from './context.js';
import type { DecryptionRequest } from './types.js';

const logger = getComponentLogger('TimeoutController');

export class TimeoutController {
    constructor(private readonly ctx: RevealContext) { }

    isTimedOut(requestId: RequestId): boolean {
        return this.hasTimedOut(this.ctx.store.require(requestId));
    }

    hasTimedOut(request: DecryptionRequest): boolean {
        return request.status === 'PENDING' &&
            this.ctx.clock.now() >= request.createdAt + this.ctx.settings.decryptionTimeoutMs;
    }

    /**
     * Permissionless.
     */
    forceTimeout(requestId: RequestId): DecryptionRequest {
        return this.ctx.guard.run('forceTimeout', () => {
            const request = this.ctx.store.require(requestId);

            if (request.status !== 'PENDING') {
                throw new RevealError('ALREADY_FINALIZED', `Request ${requestId} is already ${request.status}`);
            }
            if (!this.hasTimedOut(request)) {
                throw new RevealError('NOT_TIMED_OUT', `Request ${requestId} has not reached its timeout`);
            }

            return this.expire(request);
        });
    }

    /**
     * Refunds the newest refundable request of the group that the claimant
     * may claim: their own, or any request for a holder of reveal:refund-any.
     * When none is refundable the newest claimable request decides the error.
     * A PENDING request past its timeout is first moved to TIMED_OUT.
     */
    claimRefund(groupId: GroupId, claimant: Identity): DecryptionRequest {
        return this.ctx.guard.run('claimRefund', () => {
            const { store, authorizer, clock, events, settings } = this.ctx;

            const history = store.forGroup(groupId);
            if (history.length === 0) {
                throw new RevealError('NO_REQUEST', `Group ${groupId} has no reveal request`);
            }

            const claimable = authorizer.can(claimant, 'reveal:refund-any')
                ? history
                : history.filter(request => request.requester === claimant);
            const newest = claimable[0];
            if (!newest) {
                logger.warn({ groupId, claimant }, 'Refund claim denied');
                throw new RevealError('NOT_AUTHORIZED', `Identity ${claimant} may not claim this refund`);
            }

            const target = claimable.find(request => this.isRefundable(request)) ?? newest;

            if (target.refundClaimed) {
                logger.warn({ groupId, requestId: target.requestId }, 'Refund replay rejected');
                throw new RevealError('ALREADY_CLAIMED', `Refund for request ${target.requestId} was already claimed`);
            }

            const timedOut = this.hasTimedOut(target);
            if (target.status !== 'FAILED' && target.status !== 'TIMED_OUT' && !timedOut) {
                throw new RevealError('NOT_ELIGIBLE', `Request ${target.requestId} is ${target.status}`);
            }

            if (clock.now() > target.createdAt + settings.maxRefundWindowMs) {
                throw new RevealError('WINDOW_EXPIRED', `Refund window for request ${target.requestId} has closed`);
            }

            if (timedOut) {
                this.expire(target);
            }

            const refunded = store.markRefundClaimed(target.requestId);
            this.releaseGroup(refunded);

            logger.info({ groupId, requestId: refunded.requestId, claimant }, 'Refund claimed');
            events.emit('RefundClaimed', { groupId, requestId: refunded.requestId, claimant });

            return refunded;
        });
    }

    private isRefundable(request: DecryptionRequest): boolean {
        const eligible = request.status === 'FAILED' || request.status === 'TIMED_OUT' || this.hasTimedOut(request);
        return eligible &&
            !request.refundClaimed &&
            this.ctx.clock.now() <= request.createdAt + this.ctx.settings.maxRefundWindowMs;
    }

    private expire(request: DecryptionRequest): DecryptionRequest {
        const expired = this.ctx.store.finalize(request.requestId, 'TIMED_OUT', this.ctx.clock.now());
        this.releaseGroup(expired);

        logger.info({ requestId: expired.requestId, groupId: expired.groupId }, 'Reveal timed out');
        this.ctx.events.emit('RevealTimedOut', { requestId: expired.requestId, groupId: expired.groupId });

        return expired;
    }

    /**
     * Clears the group's pending pair only while it still points at this request.
     */
    private releaseGroup(request: DecryptionRequest): void {
        const aggregate = this.ctx.ledger.getGroupAggregate(request.groupId);
        if (aggregate?.pendingRequestId === request.requestId) {
            this.ctx.ledger.clearGroupPending(request.groupId);
        }
    }
}
