import crypto from "crypto";
import { GENESIS_HASH, RevealAuditRecordV1, UnsignedAuditRecord } from "./schema.js";

/**
 * Deterministic JSON with sorted object keys. Records read back from a
 * jsonb column lose their key order, so hashing must not depend on it.
 */
export function canonicalJson(value: unknown): string {
    if (Array.isArray(value)) {
        return `[${value.map(canonicalJson).join(",")}]`;
    }
    if (value !== null && typeof value === "object") {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
            .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
        return `{${entries.join(",")}}`;
    }
    return JSON.stringify(value);
}

export function computeRecordHash(record: UnsignedAuditRecord, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(canonicalJson(record) + prevHash)
        .digest("hex");
}

/**
 * Audit Integrity Verifier
 * Validates the cryptographic chain of audit records, oldest first.
 */
export function verifyAuditChain(records: readonly RevealAuditRecordV1[]): {
    valid: boolean;
    violationIndex?: number;
    reason?: string
} {
    let lastHash = GENESIS_HASH;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        const { integrity, ...contentsOnly } = record;
        const computedHash = computeRecordHash(contentsOnly, integrity.prevHash);

        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}
