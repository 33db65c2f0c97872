import { GuardRule } from '../config-guard.js';

/**
 * Oracle Configuration Guards
 * The verification key and owner identity have no defaults.
 */
export const ORACLE_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'ORACLE_VERIFICATION_KEY', sensitive: true },
    { type: 'required', name: 'OWNER_IDENTITY' },

    {
        type: 'forbidIf',
        name: 'PlaceholderOracleKey',
        when: (env) => env.NODE_ENV === 'production' && env.ORACLE_VERIFICATION_KEY === 'test-secret',
        message: 'Placeholder oracle verification key must never load in production',
    },
];
