/**
 * Unit Tests: InMemoryGroupLedger
 *
 * @see libs/ledger/InMemoryGroupLedger.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { InMemoryGroupLedger } from '../../libs/ledger/InMemoryGroupLedger.js';
import { RoleRegistry } from '../../libs/auth/roleRegistry.js';
import { ManualClock } from '../../libs/clock/clock.js';
import { HandleArithmetic } from '../../libs/ledger/handleArithmetic.js';
import { isRevealError } from '../../libs/errors/RevealError.js';
import { MANAGER, OWNER, PlainArithmetic, T0 } from './helpers/harness.js';

const EXHIBITION = { name: 'Tidal Maps', category: 'HISTORY', startsAt: T0, endsAt: T0 + 86_400_000 };
const VISIT = { satisfaction: 8, durationMinutes: 120, interestLevel: 4 };

describe('InMemoryGroupLedger', () => {
    let clock: ManualClock;
    let ledger: InMemoryGroupLedger;

    beforeEach(() => {
        clock = new ManualClock(T0);
        const roles = new RoleRegistry(OWNER);
        roles.setManager(OWNER, MANAGER);
        ledger = new InMemoryGroupLedger(clock, roles, new PlainArithmetic());
    });

    describe('createGroup', () => {
        it('should number groups from 1 and start them active and empty', () => {
            assert.strictEqual(ledger.createGroup(OWNER, EXHIBITION), 1);
            assert.strictEqual(ledger.createGroup(MANAGER, EXHIBITION), 2);

            assert.deepStrictEqual(ledger.getGroupInfo(1), {
                groupId: 1,
                name: 'Tidal Maps',
                category: 'HISTORY',
                startsAt: T0,
                endsAt: T0 + 86_400_000,
                createdAt: T0,
                isActive: true,
                visibleParticipationCount: 0
            });
            assert.deepStrictEqual(ledger.getGroupAggregate(1), {
                groupId: 1,
                encryptedCount: 'enc:0',
                encryptedSum: 'enc:0',
                visibleParticipationCount: 0,
                pendingRequestId: null,
                isPendingFlag: false
            });
        });

        it('should reject participants creating groups', () => {
            assert.throws(
                () => ledger.createGroup('visitor-1', EXHIBITION),
                (err: unknown) => isRevealError(err, 'NOT_AUTHORIZED')
            );
        });

        it('should reject an end before the start', () => {
            assert.throws(
                () => ledger.createGroup(OWNER, { ...EXHIBITION, endsAt: T0 }),
                (err: unknown) => isRevealError(err, 'INVALID_DATE_RANGE')
            );
        });

        it('should validate the category and name', () => {
            assert.throws(
                () => ledger.createGroup(OWNER, { ...EXHIBITION, category: 'SPORTS' }),
                (err: unknown) => isRevealError(err, 'INVALID_INPUT')
            );
            assert.throws(
                () => ledger.createGroup(OWNER, { ...EXHIBITION, name: '   ' }),
                (err: unknown) => isRevealError(err, 'INVALID_INPUT')
            );
        });
    });

    describe('participants and contributions', () => {
        const rejectsInput = (err: unknown) => isRevealError(err, 'INVALID_INPUT');

        it('should register a participant once', () => {
            clock.advance(250);
            assert.strictEqual(ledger.registerParticipant('visitor-1', { age: 25 }), T0 + 250);
            assert.strictEqual(ledger.isRegistered('visitor-1'), true);
            assert.throws(
                () => ledger.registerParticipant('visitor-1', { age: 30 }),
                (err: unknown) => isRevealError(err, 'ALREADY_REGISTERED')
            );
        });

        it('should accept ages 1 to 119 only', () => {
            assert.throws(() => ledger.registerParticipant('visitor-0', { age: 0 }), rejectsInput);
            assert.throws(() => ledger.registerParticipant('visitor-0', { age: 120 }), rejectsInput);
            assert.throws(() => ledger.registerParticipant('visitor-0', { age: 18.5 }), rejectsInput);
            assert.throws(() => ledger.registerParticipant('visitor-0', {}), rejectsInput);
            assert.strictEqual(ledger.isRegistered('visitor-0'), false);

            ledger.registerParticipant('visitor-young', { age: 1 });
            ledger.registerParticipant('visitor-old', { age: 119 });
            assert.deepStrictEqual(ledger.getPublicStats(), { totalGroups: 0, totalParticipants: 2 });
        });

        it('should accumulate the encrypted count and satisfaction sum', () => {
            const groupId = ledger.createGroup(OWNER, EXHIBITION);
            ledger.registerParticipant('visitor-1', { age: 25 });
            ledger.registerParticipant('visitor-2', { age: 35 });

            ledger.recordContribution('visitor-1', groupId, { ...VISIT, satisfaction: 4 });
            ledger.recordContribution('visitor-2', groupId, { ...VISIT, satisfaction: 7 });

            const aggregate = ledger.getGroupAggregate(groupId);
            assert.strictEqual(aggregate?.encryptedCount, 'enc:2');
            assert.strictEqual(aggregate?.encryptedSum, 'enc:11');
            assert.strictEqual(ledger.getParticipationCount(groupId), 2);
            assert.strictEqual(ledger.hasContributed('visitor-1', groupId), true);
            assert.deepStrictEqual(ledger.getPublicStats(), { totalGroups: 1, totalParticipants: 2 });
        });

        it('should keep the encrypted visit record for the participant', () => {
            const groupId = ledger.createGroup(OWNER, EXHIBITION);
            ledger.registerParticipant('visitor-1', { age: 25 });
            clock.advance(500);

            ledger.recordContribution('visitor-1', groupId, VISIT);

            assert.deepStrictEqual(ledger.getContributionRecord('visitor-1', groupId), {
                groupId,
                encryptedSatisfaction: 'enc:8',
                encryptedDuration: 'enc:120',
                encryptedInterest: 'enc:4',
                recordedAt: T0 + 500
            });
            assert.strictEqual(ledger.getContributionRecord('visitor-1', groupId + 1), undefined);
            assert.deepStrictEqual(ledger.getParticipantStats('visitor-1'), {
                isRegistered: true,
                registeredAt: T0,
                contributionCount: 1
            });
        });

        it('should report empty stats for an unregistered participant', () => {
            assert.deepStrictEqual(ledger.getParticipantStats('visitor-9'), {
                isRegistered: false,
                registeredAt: 0,
                contributionCount: 0
            });
        });

        it('should accept satisfaction 1 to 10 only', () => {
            ledger.registerParticipant('visitor-1', { age: 25 });
            const groupId = ledger.createGroup(OWNER, EXHIBITION);

            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, satisfaction: 0 }), rejectsInput);
            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, satisfaction: 11 }), rejectsInput);
            assert.strictEqual(ledger.getParticipationCount(groupId), 0);

            ledger.recordContribution('visitor-1', groupId, { ...VISIT, satisfaction: 1 });
            ledger.recordContribution('visitor-1', ledger.createGroup(OWNER, EXHIBITION), { ...VISIT, satisfaction: 10 });
            assert.strictEqual(ledger.getParticipantStats('visitor-1').contributionCount, 2);
        });

        it('should accept interest levels 1 to 5 only', () => {
            ledger.registerParticipant('visitor-1', { age: 25 });
            const groupId = ledger.createGroup(OWNER, EXHIBITION);

            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, interestLevel: 0 }), rejectsInput);
            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, interestLevel: 6 }), rejectsInput);

            ledger.recordContribution('visitor-1', groupId, { ...VISIT, interestLevel: 1 });
            ledger.recordContribution('visitor-1', ledger.createGroup(OWNER, EXHIBITION), { ...VISIT, interestLevel: 5 });
            assert.strictEqual(ledger.getParticipantStats('visitor-1').contributionCount, 2);
        });

        it('should accept any whole-minute duration up to 2^32 - 1', () => {
            ledger.registerParticipant('visitor-1', { age: 25 });
            const groupId = ledger.createGroup(OWNER, EXHIBITION);

            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, durationMinutes: -1 }), rejectsInput);
            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, durationMinutes: 2 ** 32 }), rejectsInput);
            assert.throws(() => ledger.recordContribution('visitor-1', groupId, { ...VISIT, durationMinutes: 1.5 }), rejectsInput);

            ledger.recordContribution('visitor-1', groupId, { ...VISIT, durationMinutes: 0 });
            const longVisit = ledger.createGroup(OWNER, EXHIBITION);
            ledger.recordContribution('visitor-1', longVisit, { ...VISIT, durationMinutes: 525_600 });
            assert.strictEqual(ledger.getContributionRecord('visitor-1', longVisit)?.encryptedDuration, 'enc:525600');
        });

        it('should reject a second contribution from the same participant', () => {
            const groupId = ledger.createGroup(OWNER, EXHIBITION);
            ledger.registerParticipant('visitor-1', { age: 25 });
            ledger.recordContribution('visitor-1', groupId, VISIT);

            assert.throws(
                () => ledger.recordContribution('visitor-1', groupId, { ...VISIT, satisfaction: 9 }),
                (err: unknown) => isRevealError(err, 'ALREADY_CONTRIBUTED')
            );
            assert.strictEqual(ledger.getParticipationCount(groupId), 1);
            assert.strictEqual(ledger.getContributionRecord('visitor-1', groupId)?.encryptedSatisfaction, 'enc:8');
        });

        it('should reject unregistered participants, unknown and inactive groups', () => {
            const groupId = ledger.createGroup(OWNER, EXHIBITION);
            ledger.registerParticipant('visitor-1', { age: 25 });

            assert.throws(
                () => ledger.recordContribution('visitor-9', groupId, VISIT),
                (err: unknown) => isRevealError(err, 'NOT_REGISTERED')
            );
            assert.throws(
                () => ledger.recordContribution('visitor-1', 99, VISIT),
                (err: unknown) => isRevealError(err, 'GROUP_NOT_FOUND')
            );

            ledger.setGroupActive(MANAGER, groupId, false);
            assert.throws(
                () => ledger.recordContribution('visitor-1', groupId, VISIT),
                (err: unknown) => isRevealError(err, 'GROUP_INACTIVE')
            );
            assert.strictEqual(ledger.getGroupInfo(groupId).isActive, false);
        });
    });

    describe('pending pair', () => {
        it('should hold at most one pending request per group', () => {
            const groupId = ledger.createGroup(OWNER, EXHIBITION);
            ledger.setGroupPending(groupId, '100');

            assert.throws(
                () => ledger.setGroupPending(groupId, '101'),
                (err: unknown) => isRevealError(err, 'REQUEST_ALREADY_PENDING')
            );
            assert.strictEqual(ledger.getGroupAggregate(groupId)?.pendingRequestId, '100');
            assert.strictEqual(ledger.getGroupAggregate(groupId)?.isPendingFlag, true);
        });

        it('should clear idempotently', () => {
            const groupId = ledger.createGroup(OWNER, EXHIBITION);
            ledger.setGroupPending(groupId, '100');
            ledger.clearGroupPending(groupId);
            ledger.clearGroupPending(groupId);

            assert.strictEqual(ledger.getGroupAggregate(groupId)?.isPendingFlag, false);
        });

        it('should return undefined for an unknown group aggregate', () => {
            assert.strictEqual(ledger.getGroupAggregate(42), undefined);
            assert.throws(
                () => ledger.getParticipationCount(42),
                (err: unknown) => isRevealError(err, 'GROUP_NOT_FOUND')
            );
        });
    });
});

describe('HandleArithmetic', () => {
    const arithmetic = new HandleArithmetic();

    it('should produce deterministic 32-byte handles', () => {
        assert.match(arithmetic.zero(), /^0x[0-9a-f]{64}$/);
        assert.strictEqual(arithmetic.zero(), arithmetic.encryptConstant(0));
        assert.strictEqual(
            arithmetic.add(arithmetic.zero(), arithmetic.encryptConstant(1)),
            arithmetic.add(arithmetic.zero(), arithmetic.encryptConstant(1))
        );
    });

    it('should distinguish operand order', () => {
        const one = arithmetic.encryptConstant(1);
        const two = arithmetic.encryptConstant(2);
        assert.notStrictEqual(arithmetic.add(one, two), arithmetic.add(two, one));
    });

    it('should reject negative constants', () => {
        assert.throws(() => arithmetic.encryptConstant(-1), RangeError);
    });
});
