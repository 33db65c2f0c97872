/**
 * Reveal Coordinator
 *
 * Facade over the request manager, callback processor and timeout
 * controller. All of them share one reentrancy guard, one store and one
 * event bus, so every mutating entry point here is mutually exclusive.
 */

import type { Clock } from '../clock/clock.js';
import type { GroupId, GroupLedger } from '../ledger/groupLedger.js';
import type { Identity, RevealAuthorizer } from '../auth/roleRegistry.js';
import type { OracleGateway } from '../oracle/oracleGateway.js';
import type { ProofVerifier } from '../oracle/proofVerifier.js';
import { RequestId, RequestIdAllocator } from '../id/RequestIdAllocator.js';
import { RevealError } from '../errors/RevealError.js';
import { getComponentLogger } from '../logging/logger.js';
import { DEFAULT_REVEAL_SETTINGS, RevealContext, RevealSettings } from './context.js';
import { RequestStore } from './RequestStore.js';
import { ReentrancyGuard } from './ReentrancyGuard.js';
import { RevealEventBus } from './events.js';
import { NoiseEpoch } from './obfuscation.js';
import { RequestManager } from './RequestManager.js';
import { CallbackProcessor } from './CallbackProcessor.js';
import { TimeoutController } from './TimeoutController.js';
import type {
    DecryptionRequest,
    PublicStatistic,
    RequestStatusView,
    RevealedStatistic,
    RevealOutcome
} from './types.js';

const logger = getComponentLogger('RevealCoordinator');

export interface RevealDependencies {
    readonly clock: Clock;
    readonly ledger: GroupLedger;
    readonly authorizer: RevealAuthorizer;
    readonly gateway: OracleGateway;
    readonly verifier: ProofVerifier;
    readonly settings?: Partial<RevealSettings>;
    readonly workerId?: number;
    readonly events?: RevealEventBus;
    readonly noise?: NoiseEpoch;
}

export class RevealCoordinator {
    private readonly ctx: RevealContext;
    private readonly manager: RequestManager;
    private readonly callbacks: CallbackProcessor;
    private readonly timeouts: TimeoutController;

    constructor(deps: RevealDependencies) {
        const settings: RevealSettings = { ...DEFAULT_REVEAL_SETTINGS, ...deps.settings };
        if (settings.maxRefundWindowMs <= settings.decryptionTimeoutMs) {
            throw new Error('Refund window must be strictly longer than the decryption timeout');
        }

        this.ctx = {
            clock: deps.clock,
            ledger: deps.ledger,
            authorizer: deps.authorizer,
            gateway: deps.gateway,
            verifier: deps.verifier,
            ids: new RequestIdAllocator(deps.clock, deps.workerId ?? 0),
            store: new RequestStore(),
            guard: new ReentrancyGuard(),
            events: deps.events ?? new RevealEventBus(deps.clock),
            noise: deps.noise ?? new NoiseEpoch(),
            settings
        };

        this.manager = new RequestManager(this.ctx);
        this.callbacks = new CallbackProcessor(this.ctx);
        this.timeouts = new TimeoutController(this.ctx);
    }

    get events(): RevealEventBus {
        return this.ctx.events;
    }

    get settings(): RevealSettings {
        return this.ctx.settings;
    }

    // --- Lifecycle ---

    requestReveal(groupId: GroupId, requester: Identity): DecryptionRequest {
        return this.manager.requestReveal(groupId, requester);
    }

    submitRevealResult(requestId: RequestId, cleartexts: string, proof: string): RevealOutcome {
        return this.callbacks.submitRevealResult(requestId, cleartexts, proof);
    }

    isTimedOut(requestId: RequestId): boolean {
        return this.timeouts.isTimedOut(requestId);
    }

    forceTimeout(requestId: RequestId): DecryptionRequest {
        return this.timeouts.forceTimeout(requestId);
    }

    claimRefund(groupId: GroupId, claimant: Identity): DecryptionRequest {
        return this.timeouts.claimRefund(groupId, claimant);
    }

    // --- Administration ---

    /**
     * Advances the noise nonce. Reveals completed afterwards use the new epoch.
     */
    refreshNoiseEpoch(admin: Identity): number {
        return this.ctx.guard.run('refreshNoiseEpoch', () => {
            if (!this.ctx.authorizer.can(admin, 'noise:refresh')) {
                logger.warn({ admin }, 'Noise refresh denied');
                throw new RevealError('NOT_AUTHORIZED', `Identity ${admin} may not refresh the noise epoch`);
            }
            const epoch = this.ctx.noise.advance();
            logger.info({ epoch }, 'Noise epoch refreshed');
            return epoch;
        });
    }

    currentNoiseEpoch(): number {
        return this.ctx.noise.current();
    }

    // --- Queries ---

    getRequestStatus(requestId: RequestId): RequestStatusView {
        const request = this.ctx.store.require(requestId);
        return {
            requestId: request.requestId,
            groupId: request.groupId,
            requester: request.requester,
            createdAt: request.createdAt,
            status: request.status,
            callbackConsumed: request.callbackConsumed,
            refundClaimed: request.refundClaimed,
            isTimedOut: this.timeouts.hasTimedOut(request)
        };
    }

    getRequest(requestId: RequestId): DecryptionRequest {
        return this.ctx.store.require(requestId);
    }

    getRevealedStatistic(groupId: GroupId): PublicStatistic {
        const statistic = this.requireStatistic(groupId);
        return { obfuscatedAverage: statistic.obfuscatedAverage, rawCount: statistic.rawCount };
    }

    getRevealedStatisticRecord(groupId: GroupId): RevealedStatistic {
        return this.requireStatistic(groupId);
    }

    latestRequestForGroup(groupId: GroupId): DecryptionRequest | undefined {
        return this.ctx.store.latestForGroup(groupId);
    }

    listPendingRequests(): DecryptionRequest[] {
        return this.ctx.store.pending();
    }

    private requireStatistic(groupId: GroupId): RevealedStatistic {
        const statistic = this.ctx.store.getStatistic(groupId);
        if (!statistic) {
            throw new RevealError('STATISTIC_NOT_REVEALED', `Group ${groupId} has no revealed statistic`);
        }
        return statistic;
    }
}
