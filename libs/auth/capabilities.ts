/**
 * Capability Registry
 *
 * Capabilities are verbs, not roles. Roles map onto a fixed capability set.
 */

export type Capability =
    // Group registry
    | 'group:manage'
    | 'manager:assign'

    // Reveal lifecycle
    | 'reveal:request'
    | 'reveal:refund-any'

    // Privacy administration
    | 'noise:refresh';

export type Role = 'OWNER' | 'MANAGER' | 'PARTICIPANT';

export const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
    OWNER: ['group:manage', 'manager:assign', 'reveal:request', 'reveal:refund-any', 'noise:refresh'],
    MANAGER: ['group:manage', 'reveal:request'],
    PARTICIPANT: []
};
