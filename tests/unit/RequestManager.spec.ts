/**
 * Unit Tests: requestReveal
 *
 * @see libs/reveal/RequestManager.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { isRevealError } from '../../libs/errors/RevealError.js';
import type { RevealEventMap } from '../../libs/reveal/events.js';
import { RevealCoordinator } from '../../libs/reveal/RevealCoordinator.js';
import type { DecryptionDispatch, OracleGateway } from '../../libs/oracle/oracleGateway.js';
import { HmacProofVerifier } from '../../libs/oracle/proofVerifier.js';
import { Harness, MANAGER, ORACLE_KEY, OWNER, T0, createHarness, oracleAnswer, seedGroup } from './helpers/harness.js';

class UnavailableGateway implements OracleGateway {
    attempts: DecryptionDispatch[] = [];

    requestDecryption(dispatch: DecryptionDispatch): void {
        this.attempts.push(dispatch);
        throw new Error('gateway unavailable');
    }
}

describe('RequestManager.requestReveal', () => {
    let h: Harness;

    beforeEach(() => {
        h = createHarness();
    });

    it('should issue a PENDING request and dispatch the aggregates', () => {
        const groupId = seedGroup(h, [4, 7]);
        const requested: RevealEventMap['RevealRequested'][] = [];
        h.coordinator.events.on('RevealRequested', payload => { requested.push(payload); });

        const request = h.coordinator.requestReveal(groupId, MANAGER);

        assert.strictEqual(request.status, 'PENDING');
        assert.strictEqual(request.requester, MANAGER);
        assert.strictEqual(request.createdAt, T0);
        assert.strictEqual(request.callbackConsumed, false);
        assert.strictEqual(h.ledger.getGroupAggregate(groupId)?.pendingRequestId, request.requestId);

        assert.deepStrictEqual(h.outbox.peek().map(entry => entry.dispatch), [{
            requestId: request.requestId,
            groupId,
            encryptedCount: 'enc:2',
            encryptedSum: 'enc:11',
            callbackTarget: 'reveal-worker/submitRevealResult'
        }]);
        assert.deepStrictEqual(requested, [{ groupId, requester: MANAGER, requestId: request.requestId }]);
    });

    it('should check the group before the requester', () => {
        assert.throws(
            () => h.coordinator.requestReveal(404, 'visitor-1'),
            (err: unknown) => isRevealError(err, 'GROUP_NOT_FOUND')
        );
    });

    it('should reject participants', () => {
        const groupId = seedGroup(h, [1]);
        assert.throws(
            () => h.coordinator.requestReveal(groupId, 'visitor-1'),
            (err: unknown) => isRevealError(err, 'NOT_AUTHORIZED')
        );
        assert.strictEqual(h.outbox.size(), 0);
    });

    it('should check authorization before the pending flag', () => {
        const groupId = seedGroup(h, [1]);
        h.coordinator.requestReveal(groupId, MANAGER);

        assert.throws(
            () => h.coordinator.requestReveal(groupId, 'visitor-1'),
            (err: unknown) => isRevealError(err, 'NOT_AUTHORIZED')
        );
    });

    it('should reject a group without participants', () => {
        const groupId = seedGroup(h, []);

        assert.throws(
            () => h.coordinator.requestReveal(groupId, OWNER),
            (err: unknown) => isRevealError(err, 'NO_PARTICIPANTS')
        );
        assert.strictEqual(h.coordinator.latestRequestForGroup(groupId), undefined);
        assert.strictEqual(h.ledger.getGroupAggregate(groupId)?.isPendingFlag, false);
    });

    it('should allow a new request only after the pending one terminates', () => {
        const groupId = seedGroup(h, [3, 3]);
        const first = h.coordinator.requestReveal(groupId, MANAGER);

        assert.throws(
            () => h.coordinator.requestReveal(groupId, OWNER),
            (err: unknown) => isRevealError(err, 'REQUEST_ALREADY_PENDING')
        );
        assert.strictEqual(h.coordinator.listPendingRequests().length, 1);

        const { cleartexts } = oracleAnswer(first.requestId, 2, 6);
        h.coordinator.submitRevealResult(first.requestId, cleartexts, `0x${'00'.repeat(32)}`);
        assert.strictEqual(h.coordinator.getRequest(first.requestId).status, 'FAILED');

        const second = h.coordinator.requestReveal(groupId, OWNER);
        assert.ok(BigInt(second.requestId) > BigInt(first.requestId));
        assert.strictEqual(h.coordinator.latestRequestForGroup(groupId)?.requestId, second.requestId);
        assert.strictEqual(h.ledger.getGroupAggregate(groupId)?.pendingRequestId, second.requestId);
    });

    it('should leave no state behind when the gateway throws', () => {
        const groupId = seedGroup(h, [3]);
        const gateway = new UnavailableGateway();
        const coordinator = new RevealCoordinator({
            clock: h.clock,
            ledger: h.ledger,
            authorizer: h.roles,
            gateway,
            verifier: new HmacProofVerifier(ORACLE_KEY)
        });
        const requested: RevealEventMap['RevealRequested'][] = [];
        coordinator.events.on('RevealRequested', payload => { requested.push(payload); });

        assert.throws(() => coordinator.requestReveal(groupId, MANAGER), /gateway unavailable/);

        assert.strictEqual(gateway.attempts.length, 1);
        assert.strictEqual(h.ledger.getGroupAggregate(groupId)?.isPendingFlag, false);
        assert.strictEqual(coordinator.latestRequestForGroup(groupId), undefined);
        assert.deepStrictEqual(coordinator.listPendingRequests(), []);
        assert.deepStrictEqual(requested, []);
    });

    it('should keep requests for different groups independent', () => {
        const a = seedGroup(h, [1]);
        const b = seedGroup(h, [2]);

        h.coordinator.requestReveal(a, MANAGER);
        h.coordinator.requestReveal(b, MANAGER);

        assert.strictEqual(h.coordinator.listPendingRequests().length, 2);
        assert.strictEqual(h.outbox.size(), 2);
    });
});
