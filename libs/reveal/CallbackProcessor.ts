/**
 * Callback Processor
 *
 * Consumes oracle results. Open to any caller: authorization comes from the
 * proof, not the caller's identity. A bad proof or undecodable cleartext
 * ends the request as FAILED and returns normally.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';
import { RevealError } from '../errors/RevealError.js';
import { getComponentLogger } from '../logging/logger.js';
import { decodeCleartexts } from '../oracle/cleartextCodec.js';
import type { VerificationResult } from '../oracle/proofVerifier.js';
import type { RevealContext } from './context.js';
import { computeObfuscatedAverage } from './obfuscation.js';
import type { DecryptionRequest, RevealOutcome } from './types.js';

const logger = getComponentLogger('CallbackProcessor');

export class CallbackProcessor {
    constructor(private readonly ctx: RevealContext) { }

    submitRevealResult(requestId: RequestId, cleartexts: string, proof: string): RevealOutcome {
        return this.ctx.guard.run('submitRevealResult', () => {
            this.requireOpen(requestId);

            const verification = this.verify(requestId, cleartexts, proof);

            // Re-read after the only external call
            const request = this.requireOpen(requestId);

            if (!verification.ok) {
                return this.fail(request, `proof:${verification.reason}`);
            }

            const decoded = decodeCleartexts(cleartexts);
            if (!decoded.ok) {
                return this.fail(request, `decode:${decoded.reason}`);
            }

            return this.complete(request, decoded.count, decoded.sum);
        });
    }

    private requireOpen(requestId: RequestId): DecryptionRequest {
        const request = this.ctx.store.require(requestId);
        if (request.status !== 'PENDING' || request.callbackConsumed) {
            logger.warn({ requestId, status: request.status }, 'Callback replay rejected');
            throw new RevealError('ALREADY_FINALIZED', `Request ${requestId} is already ${request.status}`);
        }
        return request;
    }

    /**
     * Fails closed: a throwing verifier counts as a failed verification.
     */
    private verify(requestId: RequestId, cleartexts: string, proof: string): VerificationResult {
        try {
            return this.ctx.verifier.verify({ requestId, cleartexts, proof });
        } catch (error: unknown) {
            const detail = error instanceof Error ? error.message : String(error);
            logger.warn({ requestId, error: detail }, 'Proof verifier threw');
            return { ok: false, reason: 'VERIFIER_ERROR', detail };
        }
    }

    private fail(request: DecryptionRequest, reason: string): RevealOutcome {
        const { store, ledger, clock, events } = this.ctx;

        store.finalize(request.requestId, 'FAILED', clock.now(), reason);
        ledger.clearGroupPending(request.groupId);

        logger.warn({ requestId: request.requestId, groupId: request.groupId, reason }, 'Reveal failed');
        events.emit('RevealFailed', { requestId: request.requestId, groupId: request.groupId, reason });

        return { status: 'FAILED', requestId: request.requestId, reason };
    }

    private complete(request: DecryptionRequest, count: number, sum: number): RevealOutcome {
        const { store, ledger, clock, events, noise, settings } = this.ctx;
        const now = clock.now();
        const noiseEpoch = noise.current();

        const { stored, created } = store.putStatistic({
            groupId: request.groupId,
            requestId: request.requestId,
            rawCount: count,
            rawSum: sum,
            obfuscatedAverage: computeObfuscatedAverage(sum, count, request.groupId, noiseEpoch, settings.obfuscation),
            noiseEpoch,
            revealedAt: now
        });

        if (!created) {
            logger.warn({
                requestId: request.requestId,
                groupId: request.groupId,
                statisticRequestId: stored.requestId
            }, 'Group statistic already revealed; keeping the first one');
        }

        store.finalize(request.requestId, 'COMPLETED', now);
        ledger.clearGroupPending(request.groupId);

        logger.info({ requestId: request.requestId, groupId: request.groupId }, 'Reveal completed');
        events.emit('RevealCompleted', { groupId: request.groupId, requestId: request.requestId, count, sum });

        return { status: 'COMPLETED', requestId: request.requestId, statistic: stored, firstReveal: created };
    }
}
