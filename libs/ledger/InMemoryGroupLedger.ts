/**
 * In-process group registry and aggregate store.
 *
 * Groups ("exhibitions") are created by a manager, participants register
 * once with their age, and each registered participant may record one visit
 * per active group: a satisfaction rating, a duration and an interest level.
 * Plaintext fields are range-checked, then encrypted through the arithmetic
 * layer. The visible participation counter is public; the count and the
 * satisfaction sum stay encrypted until a reveal completes.
 */

import type { RequestId } from '../id/RequestIdAllocator.js';
import type { Clock } from '../clock/clock.js';
import type { Identity, RoleRegistry } from '../auth/roleRegistry.js';
import { RevealError } from '../errors/RevealError.js';
import { getComponentLogger } from '../logging/logger.js';
import {
    ContributionSchema,
    CreateGroupInput,
    CreateGroupSchema,
    RegisterParticipantSchema
} from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';
import {
    Ciphertext,
    EncryptedArithmetic,
    GroupAggregateView,
    GroupId,
    GroupLedger
} from './groupLedger.js';

const logger = getComponentLogger('GroupLedger');

export interface GroupInfo {
    readonly groupId: GroupId;
    readonly name: string;
    readonly category: CreateGroupInput['category'];
    readonly startsAt: number;
    readonly endsAt: number;
    readonly isActive: boolean;
    readonly visibleParticipationCount: number;
    readonly createdAt: number;
}

export interface PublicStats {
    readonly totalGroups: number;
    readonly totalParticipants: number;
}

/**
 * What a participant may read about themselves. registeredAt is 0 when unregistered.
 */
export interface ParticipantStats {
    readonly isRegistered: boolean;
    readonly registeredAt: number;
    readonly contributionCount: number;
}

export interface ContributionRecord {
    readonly groupId: GroupId;
    readonly encryptedSatisfaction: Ciphertext;
    readonly encryptedDuration: Ciphertext;
    readonly encryptedInterest: Ciphertext;
    readonly recordedAt: number;
}

interface ParticipantRecord {
    readonly registeredAt: number;
    readonly encryptedAge: Ciphertext;
    readonly contributions: Map<GroupId, ContributionRecord>;
}

interface GroupRecord {
    info: Omit<GroupInfo, 'visibleParticipationCount' | 'isActive'>;
    isActive: boolean;
    encryptedCount: Ciphertext;
    encryptedSum: Ciphertext;
    visibleParticipationCount: number;
    pendingRequestId: RequestId | null;
    contributors: Set<Identity>;
}

export class InMemoryGroupLedger implements GroupLedger {
    private readonly groups = new Map<GroupId, GroupRecord>();
    private readonly participants = new Map<Identity, ParticipantRecord>();
    private nextGroupId: GroupId = 1;

    constructor(
        private readonly clock: Clock,
        private readonly roles: RoleRegistry,
        private readonly arithmetic: EncryptedArithmetic
    ) { }

    // --- Registry ---

    createGroup(actor: Identity, input: unknown): GroupId {
        this.roles.require(actor, 'group:manage');
        const parsed = validate(CreateGroupSchema, input, 'GroupLedger:createGroup');

        if (parsed.endsAt <= parsed.startsAt) {
            throw new RevealError('INVALID_DATE_RANGE', 'Group must end after it starts');
        }

        const groupId = this.nextGroupId++;
        this.groups.set(groupId, {
            info: {
                groupId,
                name: parsed.name,
                category: parsed.category,
                startsAt: parsed.startsAt,
                endsAt: parsed.endsAt,
                createdAt: this.clock.now()
            },
            isActive: true,
            encryptedCount: this.arithmetic.zero(),
            encryptedSum: this.arithmetic.zero(),
            visibleParticipationCount: 0,
            pendingRequestId: null,
            contributors: new Set()
        });

        logger.info({ groupId, name: parsed.name, category: parsed.category }, 'Group created');
        return groupId;
    }

    setGroupActive(actor: Identity, groupId: GroupId, active: boolean): void {
        this.roles.require(actor, 'group:manage');
        this.mustGet(groupId).isActive = active;
        logger.info({ groupId, active }, 'Group status changed');
    }

    registerParticipant(identity: Identity, input: unknown): number {
        if (!identity.trim()) {
            throw new RevealError('INVALID_INPUT', 'Participant identity must be non-empty');
        }
        const { age } = validate(RegisterParticipantSchema, input, 'GroupLedger:registerParticipant');
        if (this.participants.has(identity)) {
            throw new RevealError('ALREADY_REGISTERED', `Participant ${identity} is already registered`);
        }

        const registeredAt = this.clock.now();
        this.participants.set(identity, {
            registeredAt,
            encryptedAge: this.arithmetic.encryptConstant(age),
            contributions: new Map()
        });
        logger.info({ participant: identity }, 'Participant registered');
        return registeredAt;
    }

    isRegistered(identity: Identity): boolean {
        return this.participants.has(identity);
    }

    /**
     * Records one visit. Only the satisfaction rating feeds the group sum.
     */
    recordContribution(participant: Identity, groupId: GroupId, input: unknown): void {
        const visit = validate(ContributionSchema, input, 'GroupLedger:recordContribution');

        const record = this.participants.get(participant);
        if (!record) {
            throw new RevealError('NOT_REGISTERED', `Participant ${participant} is not registered`);
        }
        const group = this.mustGet(groupId);
        if (!group.isActive) {
            throw new RevealError('GROUP_INACTIVE', `Group ${groupId} is not active`);
        }
        if (group.contributors.has(participant)) {
            throw new RevealError('ALREADY_CONTRIBUTED', `Participant already contributed to group ${groupId}`);
        }

        const encryptedSatisfaction = this.arithmetic.encryptConstant(visit.satisfaction);
        record.contributions.set(groupId, Object.freeze({
            groupId,
            encryptedSatisfaction,
            encryptedDuration: this.arithmetic.encryptConstant(visit.durationMinutes),
            encryptedInterest: this.arithmetic.encryptConstant(visit.interestLevel),
            recordedAt: this.clock.now()
        }));

        group.encryptedCount = this.arithmetic.add(group.encryptedCount, this.arithmetic.encryptConstant(1));
        group.encryptedSum = this.arithmetic.add(group.encryptedSum, encryptedSatisfaction);
        group.visibleParticipationCount += 1;
        group.contributors.add(participant);

        logger.info({ groupId, participationCount: group.visibleParticipationCount }, 'Contribution recorded');
    }

    hasContributed(participant: Identity, groupId: GroupId): boolean {
        return this.groups.get(groupId)?.contributors.has(participant) ?? false;
    }

    getContributionRecord(participant: Identity, groupId: GroupId): ContributionRecord | undefined {
        return this.participants.get(participant)?.contributions.get(groupId);
    }

    getParticipantStats(identity: Identity): ParticipantStats {
        const record = this.participants.get(identity);
        return {
            isRegistered: record !== undefined,
            registeredAt: record?.registeredAt ?? 0,
            contributionCount: record?.contributions.size ?? 0
        };
    }

    getGroupInfo(groupId: GroupId): GroupInfo {
        const group = this.mustGet(groupId);
        return Object.freeze({
            ...group.info,
            isActive: group.isActive,
            visibleParticipationCount: group.visibleParticipationCount
        });
    }

    getPublicStats(): PublicStats {
        return { totalGroups: this.groups.size, totalParticipants: this.participants.size };
    }

    // --- GroupLedger boundary ---

    getGroupAggregate(groupId: GroupId): GroupAggregateView | undefined {
        const group = this.groups.get(groupId);
        if (!group) return undefined;
        return Object.freeze({
            groupId,
            encryptedCount: group.encryptedCount,
            encryptedSum: group.encryptedSum,
            visibleParticipationCount: group.visibleParticipationCount,
            pendingRequestId: group.pendingRequestId,
            isPendingFlag: group.pendingRequestId !== null
        });
    }

    setGroupPending(groupId: GroupId, requestId: RequestId): void {
        const group = this.mustGet(groupId);
        if (group.pendingRequestId !== null) {
            throw new RevealError('REQUEST_ALREADY_PENDING', `Group ${groupId} already has pending request ${group.pendingRequestId}`);
        }
        group.pendingRequestId = requestId;
    }

    clearGroupPending(groupId: GroupId): void {
        this.mustGet(groupId).pendingRequestId = null;
    }

    getParticipationCount(groupId: GroupId): number {
        return this.mustGet(groupId).visibleParticipationCount;
    }

    private mustGet(groupId: GroupId): GroupRecord {
        const group = this.groups.get(groupId);
        if (!group) {
            throw new RevealError('GROUP_NOT_FOUND', `Group ${groupId} does not exist`);
        }
        return group;
    }
}
