/**
 * Decryption Request Manager
 *
 * Issues reveal requests. The group's pending flag is the lock that keeps
 * a second request for the same group out until the first one terminates.
 */

import type { GroupId } from '../ledger/groupLedger.js';
import type { Identity } from '../auth/roleRegistry.js';
import { RevealError } from '../errors/RevealError.js';
import { getComponentLogger } from '../logging/logger.js';
import type { RevealContext } from './context.js';
import type { DecryptionRequest } from './types.js';

const logger = getComponentLogger('RequestManager');

export class RequestManager {
    constructor(private readonly ctx: RevealContext) { }

    /**
     * Check order: group, authorization, pending flag, participants.
     * Nothing is mutated unless every check passes.
     */
    requestReveal(groupId: GroupId, requester: Identity): DecryptionRequest {
        return this.ctx.guard.run('requestReveal', () => {
            const { ledger, authorizer, store, ids, clock, gateway, events, settings } = this.ctx;

            const aggregate = ledger.getGroupAggregate(groupId);
            if (!aggregate) {
                throw new RevealError('GROUP_NOT_FOUND', `Group ${groupId} does not exist`);
            }

            if (!authorizer.can(requester, 'reveal:request')) {
                logger.warn({ groupId, requester }, 'Reveal request denied');
                throw new RevealError('NOT_AUTHORIZED', `Identity ${requester} may not request reveals`);
            }

            if (aggregate.isPendingFlag) {
                throw new RevealError(
                    'REQUEST_ALREADY_PENDING',
                    `Group ${groupId} already has pending request ${aggregate.pendingRequestId ?? 'unknown'}`
                );
            }

            if (ledger.getParticipationCount(groupId) === 0) {
                throw new RevealError('NO_PARTICIPANTS', `Group ${groupId} has no recorded participants`);
            }

            const requestId = ids.next();

            // Enqueue first: a gateway that throws leaves no PENDING record behind
            gateway.requestDecryption({
                requestId,
                groupId,
                encryptedCount: aggregate.encryptedCount,
                encryptedSum: aggregate.encryptedSum,
                callbackTarget: settings.callbackTarget
            });

            ledger.setGroupPending(groupId, requestId);
            const request = store.create({
                requestId,
                groupId,
                requester,
                createdAt: clock.now()
            });

            logger.info({ requestId, groupId, requester }, 'Reveal requested');
            events.emit('RevealRequested', { groupId, requester, requestId });

            return request;
        });
    }
}
