import { ConfigGuard, Env } from '../config-guard.js';
import { ORACLE_CONFIG_GUARDS } from './oracle-config.js';
import { AUDIT_DB_CONFIG_GUARDS } from './db-config.js';
import { RevealEnvSchema } from '../../validation/schema.js';
import { validate } from '../../validation/zod-middleware.js';

export interface ObfuscationSettings {
    readonly precisionScale: number;
    readonly smallSampleThreshold: number;
    readonly noiseRange: number;
    readonly maxScaleValue: number;
}

export interface RevealConfig {
    readonly decryptionTimeoutMs: number;
    readonly maxRefundWindowMs: number;
    readonly obfuscation: ObfuscationSettings;
    readonly oracleCallbackTarget: string;
    readonly oracleVerificationKey: string;
    readonly ownerIdentity: string;
    readonly sweepIntervalMs: number;
    readonly relayIntervalMs: number;
    readonly relayMaxAttempts: number;
    readonly workerId: number;
    readonly auditSink: 'memory' | 'postgres';
}

export const DEFAULT_OBFUSCATION: ObfuscationSettings = Object.freeze({
    precisionScale: 1000,
    smallSampleThreshold: 5,
    noiseRange: 1000,
    maxScaleValue: 1_000_000
});

/**
 * Loads the runtime configuration.
 * Guards run before schema validation.
 */
export function loadRevealConfig(env: Env = process.env): RevealConfig {
    ConfigGuard.enforce(ORACLE_CONFIG_GUARDS, env);
    if (env.AUDIT_SINK === 'postgres') {
        ConfigGuard.enforce(AUDIT_DB_CONFIG_GUARDS, env);
    }

    const parsed = validate(RevealEnvSchema, env, 'RevealConfig');

    return Object.freeze({
        decryptionTimeoutMs: parsed.DECRYPTION_TIMEOUT_SECONDS * 1000,
        maxRefundWindowMs: parsed.MAX_REFUND_WINDOW_SECONDS * 1000,
        obfuscation: Object.freeze({
            precisionScale: parsed.PRECISION_SCALE,
            smallSampleThreshold: parsed.SMALL_SAMPLE_THRESHOLD,
            noiseRange: parsed.NOISE_RANGE,
            maxScaleValue: parsed.MAX_SCALE_VALUE
        }),
        oracleCallbackTarget: parsed.ORACLE_CALLBACK_TARGET,
        oracleVerificationKey: parsed.ORACLE_VERIFICATION_KEY,
        ownerIdentity: parsed.OWNER_IDENTITY,
        sweepIntervalMs: parsed.SWEEP_INTERVAL_MS,
        relayIntervalMs: parsed.RELAY_INTERVAL_MS,
        relayMaxAttempts: parsed.RELAY_MAX_ATTEMPTS,
        workerId: parsed.WORKER_ID,
        auditSink: parsed.AUDIT_SINK
    });
}
