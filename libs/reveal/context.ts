import type { Clock } from '../clock/clock.js';
import type { GroupLedger } from '../ledger/groupLedger.js';
import type { RevealAuthorizer } from '../auth/roleRegistry.js';
import type { OracleGateway } from '../oracle/oracleGateway.js';
import type { ProofVerifier } from '../oracle/proofVerifier.js';
import type { RequestIdAllocator } from '../id/RequestIdAllocator.js';
import { DEFAULT_OBFUSCATION, ObfuscationSettings } from '../bootstrap/config/reveal-config.js';
import { HOUR_MS } from '../clock/clock.js';
import type { RequestStore } from './RequestStore.js';
import type { ReentrancyGuard } from './ReentrancyGuard.js';
import type { RevealEventBus } from './events.js';
import type { NoiseEpoch } from './obfuscation.js';

export interface RevealSettings {
    readonly decryptionTimeoutMs: number;
    readonly maxRefundWindowMs: number;
    readonly callbackTarget: string;
    readonly obfuscation: ObfuscationSettings;
}

export const DEFAULT_REVEAL_SETTINGS: RevealSettings = Object.freeze({
    decryptionTimeoutMs: 24 * HOUR_MS,
    maxRefundWindowMs: 48 * HOUR_MS,
    callbackTarget: 'reveal-worker/submitRevealResult',
    obfuscation: DEFAULT_OBFUSCATION
});

/**
 * Everything the lifecycle components share. One instance per coordinator.
 */
export interface RevealContext {
    readonly clock: Clock;
    readonly ledger: GroupLedger;
    readonly authorizer: RevealAuthorizer;
    readonly gateway: OracleGateway;
    readonly verifier: ProofVerifier;
    readonly ids: RequestIdAllocator;
    readonly store: RequestStore;
    readonly guard: ReentrancyGuard;
    readonly events: RevealEventBus;
    readonly noise: NoiseEpoch;
    readonly settings: RevealSettings;
}
