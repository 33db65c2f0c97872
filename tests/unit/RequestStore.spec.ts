/**
 * Unit Tests: RequestStore
 *
 * @see libs/reveal/RequestStore.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { RequestStore } from '../../libs/reveal/RequestStore.js';
import type { RevealedStatistic } from '../../libs/reveal/types.js';
import { isRevealError } from '../../libs/errors/RevealError.js';

const statistic = (requestId: string, rawSum: number): RevealedStatistic => ({
    groupId: 1,
    requestId,
    rawCount: 10,
    rawSum,
    obfuscatedAverage: rawSum * 100,
    noiseEpoch: 0,
    revealedAt: 5
});

describe('RequestStore', () => {
    let store: RequestStore;

    beforeEach(() => {
        store = new RequestStore();
        store.create({ requestId: '100', groupId: 1, requester: 'manager-1', createdAt: 0 });
    });

    it('should create PENDING records', () => {
        assert.deepStrictEqual(store.require('100'), {
            requestId: '100',
            groupId: 1,
            requester: 'manager-1',
            createdAt: 0,
            status: 'PENDING',
            callbackConsumed: false,
            refundClaimed: false,
            finalizedAt: null,
            failureReason: null
        });
        assert.ok(Object.isFrozen(store.require('100')));
        assert.strictEqual(store.size(), 1);
    });

    it('should refuse a duplicate id', () => {
        assert.throws(
            () => store.create({ requestId: '100', groupId: 2, requester: 'x', createdAt: 1 }),
            /duplicate request id 100/
        );
    });

    it('should throw REQUEST_NOT_FOUND for unknown ids', () => {
        assert.strictEqual(store.get('999'), undefined);
        assert.throws(() => store.require('999'), (err: unknown) => isRevealError(err, 'REQUEST_NOT_FOUND'));
    });

    it('should track the latest request per group', () => {
        store.finalize('100', 'TIMED_OUT', 10);
        store.create({ requestId: '101', groupId: 1, requester: 'manager-1', createdAt: 20 });

        assert.strictEqual(store.latestForGroup(1)?.requestId, '101');
        assert.strictEqual(store.latestForGroup(2), undefined);
    });

    it('should list a group history newest first', () => {
        store.finalize('100', 'FAILED', 10, 'proof:SIGNATURE_MISMATCH');
        store.create({ requestId: '101', groupId: 1, requester: 'owner-1', createdAt: 20 });
        store.create({ requestId: '200', groupId: 2, requester: 'manager-1', createdAt: 30 });

        assert.deepStrictEqual(store.forGroup(1).map(r => r.requestId), ['101', '100']);
        assert.strictEqual(store.forGroup(1)[1]?.status, 'FAILED');
        assert.deepStrictEqual(store.forGroup(3), []);
    });

    describe('finalize', () => {
        it('should set status and consume the callback exactly once', () => {
            const failed = store.finalize('100', 'FAILED', 42, 'proof:SIGNATURE_MISMATCH');

            assert.strictEqual(failed.status, 'FAILED');
            assert.strictEqual(failed.callbackConsumed, true);
            assert.strictEqual(failed.finalizedAt, 42);
            assert.strictEqual(failed.failureReason, 'proof:SIGNATURE_MISMATCH');

            assert.throws(
                () => store.finalize('100', 'COMPLETED', 43),
                (err: unknown) => isRevealError(err, 'ALREADY_FINALIZED')
            );
            assert.strictEqual(store.require('100').status, 'FAILED');
        });

        it('should drop a failure reason on non-FAILED statuses', () => {
            assert.strictEqual(store.finalize('100', 'TIMED_OUT', 1, 'ignored').failureReason, null);
        });

        it('should leave no pending records behind', () => {
            store.finalize('100', 'COMPLETED', 1);
            assert.deepStrictEqual(store.pending(), []);
        });
    });

    describe('markRefundClaimed', () => {
        it('should refuse a PENDING or COMPLETED request', () => {
            assert.throws(() => store.markRefundClaimed('100'), (err: unknown) => isRevealError(err, 'NOT_ELIGIBLE'));
            store.finalize('100', 'COMPLETED', 1);
            assert.throws(() => store.markRefundClaimed('100'), (err: unknown) => isRevealError(err, 'NOT_ELIGIBLE'));
        });

        it('should flip refundClaimed exactly once', () => {
            store.finalize('100', 'TIMED_OUT', 1);

            assert.strictEqual(store.markRefundClaimed('100').refundClaimed, true);
            assert.throws(() => store.markRefundClaimed('100'), (err: unknown) => isRevealError(err, 'ALREADY_CLAIMED'));
        });
    });

    describe('statistics', () => {
        it('should keep the first statistic of a group', () => {
            const first = store.putStatistic(statistic('100', 85));
            const second = store.putStatistic(statistic('101', 90));

            assert.strictEqual(first.created, true);
            assert.strictEqual(second.created, false);
            assert.strictEqual(second.stored.requestId, '100');
            assert.strictEqual(store.getStatistic(1)?.rawSum, 85);
        });
    });
});
