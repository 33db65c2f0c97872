import { GuardRule } from '../config-guard.js';

/**
 * Audit DB Configuration Guards
 * Only enforced when the audit trail persists to PostgreSQL.
 */
export const AUDIT_DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'AUDIT_DB_HOST' },
    { type: 'required', name: 'AUDIT_DB_PORT' },
    { type: 'required', name: 'AUDIT_DB_USER' },
    { type: 'required', name: 'AUDIT_DB_PASSWORD', sensitive: true },
    { type: 'required', name: 'AUDIT_DB_NAME' },

    // TLS is mandatory outside development
    {
        type: 'assert',
        check: (env) =>
            !['production', 'staging'].includes(env.NODE_ENV ?? '') ||
            !!env.AUDIT_DB_CA_CERT,
        message: 'AUDIT_DB_CA_CERT is required in production/staging',
    }
];
