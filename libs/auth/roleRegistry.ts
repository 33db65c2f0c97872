import { Capability, Role, ROLE_CAPABILITIES } from "./capabilities.js";
import { RevealError } from "../errors/RevealError.js";
import { getComponentLogger } from "../logging/logger.js";

const logger = getComponentLogger('RoleRegistry');

export type Identity = string;

/**
 * Authorization boundary consumed by the reveal lifecycle.
 */
export interface RevealAuthorizer {
    can(identity: Identity, capability: Capability): boolean;
}

/**
 * Owner/manager role registry.
 * One owner fixed at construction, one manager assignable by the owner.
 * Every other identity is a participant with no capabilities.
 */
export class RoleRegistry implements RevealAuthorizer {
    private manager: Identity;

    constructor(private readonly owner: Identity) {
        if (!owner.trim()) {
            throw new Error('RoleRegistry requires a non-empty owner identity');
        }
        // The owner starts as manager until one is assigned
        this.manager = owner;
    }

    getOwner(): Identity {
        return this.owner;
    }

    getManager(): Identity {
        return this.manager;
    }

    setManager(actor: Identity, manager: Identity): void {
        this.require(actor, 'manager:assign');
        if (!manager.trim()) {
            throw new RevealError('INVALID_INPUT', 'Manager identity must be non-empty');
        }
        const previous = this.manager;
        this.manager = manager;
        logger.info({ previous, manager }, 'Manager reassigned');
    }

    roleOf(identity: Identity): Role {
        if (identity === this.owner) return 'OWNER';
        if (identity === this.manager) return 'MANAGER';
        return 'PARTICIPANT';
    }

    can(identity: Identity, capability: Capability): boolean {
        return ROLE_CAPABILITIES[this.roleOf(identity)].includes(capability);
    }

    require(identity: Identity, capability: Capability): void {
        if (!this.can(identity, capability)) {
            logger.warn({ identity, capability }, 'Capability denied');
            throw new RevealError('NOT_AUTHORIZED', `Identity lacks capability ${capability}`);
        }
    }
}
