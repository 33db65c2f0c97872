import crypto from "crypto";
import type { RequestId } from "../id/RequestIdAllocator.js";

/**
 * Oracle proof verification.
 *
 * Verification returns a result instead of throwing: a bad proof is a
 * terminal protocol outcome for the request, not an error to unwind.
 */

export type VerificationFailure =
    | 'MALFORMED_PROOF'
    | 'SIGNATURE_MISMATCH'
    | 'VERIFIER_ERROR';

export type VerificationResult =
    | { ok: true }
    | { ok: false; reason: VerificationFailure; detail?: string };

export interface RevealProofInput {
    readonly requestId: RequestId;
    readonly cleartexts: string;
    readonly proof: string;
}

export interface ProofVerifier {
    /**
     * Deterministic and side-effect free. Implementations may throw; callers
     * treat a throw as a failed verification.
     */
    verify(input: RevealProofInput): VerificationResult;
}

const PROOF_PATTERN = /^0x[0-9a-fA-F]{64}$/;

/**
 * Canonical string the oracle signs.
 */
function buildDataToSign(requestId: RequestId, cleartexts: string): string {
    return `${requestId.trim()}:${cleartexts.trim().toLowerCase()}`;
}

/**
 * Produces the proof an oracle holding `key` attaches to a result.
 */
export function signRevealResult(key: string, requestId: RequestId, cleartexts: string): string {
    const digest = crypto
        .createHmac("sha256", key)
        .update(buildDataToSign(requestId, cleartexts))
        .digest("hex");
    return `0x${digest}`;
}

/**
 * HMAC-SHA256 verifier for a single designated oracle.
 */
export class HmacProofVerifier implements ProofVerifier {
    constructor(private readonly verificationKey: string) {
        if (verificationKey.length === 0) {
            throw new Error("HmacProofVerifier requires a verification key");
        }
    }

    verify(input: RevealProofInput): VerificationResult {
        if (!PROOF_PATTERN.test(input.proof)) {
            return { ok: false, reason: 'MALFORMED_PROOF' };
        }

        const expected = Buffer.from(signRevealResult(this.verificationKey, input.requestId, input.cleartexts).slice(2), "hex");
        const presented = Buffer.from(input.proof.slice(2), "hex");

        if (!crypto.timingSafeEqual(expected, presented)) {
            return { ok: false, reason: 'SIGNATURE_MISMATCH' };
        }
        return { ok: true };
    }
}
