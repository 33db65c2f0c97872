/**
 * Centralized Redaction Configuration
 * Keys that must never reach log output. Oracle proofs and verification
 * keys are redacted alongside credentials.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'password', '*.password',
    'secret', '*.secret',
    'key', '*.key',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Oracle material (Root and Nested)
    'proof', '*.proof',
    'verificationKey', '*.verificationKey',
    'signature', '*.signature',

    // Database
    'connectionString', '*.connectionString'
];

export const REDACT_CENSOR = '[REDACTED]';
