import crypto from 'crypto';
import type { GroupId } from '../ledger/groupLedger.js';
import { DEFAULT_OBFUSCATION, ObfuscationSettings } from '../bootstrap/config/reveal-config.js';

/**
 * Privacy post-processing for revealed aggregates.
 *
 * The average is scaled by the precision scale (multiply before divide) so
 * integer arithmetic keeps fractional digits; consumers divide by the scale.
 * Groups below the small-sample threshold get deterministic noise keyed by
 * (groupId, noise epoch), stable until the epoch is refreshed.
 */

/**
 * Process-wide noise nonce. Advanced only by the administrative refresh.
 */
export class NoiseEpoch {
    private nonce = 0;

    current(): number {
        return this.nonce;
    }

    advance(): number {
        this.nonce += 1;
        return this.nonce;
    }
}

/**
 * Noise in [1, noiseRange] from the first 48 bits of sha256("groupId:nonce").
 * Even epochs draw odd offsets and odd epochs even ones, so consecutive
 * epochs never yield the same offset for a group.
 */
export function deriveNoise(groupId: GroupId, nonce: number, noiseRange: number): number {
    if (!Number.isInteger(noiseRange) || noiseRange < 2) {
        throw new RangeError(`noiseRange must be an integer >= 2, got ${noiseRange}`);
    }
    const digest = crypto.createHash('sha256').update(`${groupId}:${nonce}`).digest();
    const draw = digest.readUIntBE(0, 6);

    if (nonce % 2 === 0) {
        return 1 + 2 * (draw % Math.ceil(noiseRange / 2));
    }
    return 2 + 2 * (draw % Math.floor(noiseRange / 2));
}

export function computeObfuscatedAverage(
    sum: number,
    count: number,
    groupId: GroupId,
    nonce: number,
    settings: ObfuscationSettings = DEFAULT_OBFUSCATION
): number {
    if (count === 0) {
        return 0;
    }

    const base = (BigInt(sum) * BigInt(settings.precisionScale)) / BigInt(count);

    if (count >= settings.smallSampleThreshold) {
        return Number(base);
    }

    const noise = BigInt(deriveNoise(groupId, nonce, settings.noiseRange));
    const modulus = BigInt(settings.maxScaleValue) * BigInt(settings.precisionScale);
    return Number((base + noise) % modulus);
}
