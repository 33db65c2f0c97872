/**
 * Cleartext wire format returned by the decryption oracle.
 *
 * `0x` followed by two 32-byte big-endian words: count, then sum. Both
 * aggregates are 32-bit unsigned on the ledger, so a word above 2^32 - 1
 * is a decode failure rather than a value to truncate.
 */

const WORD_HEX_LENGTH = 64;
const UINT32_MAX = 0xffffffffn;
const HEX_BODY = /^[0-9a-fA-F]*$/;

export type DecodedAggregates =
    | { ok: true; count: number; sum: number }
    | { ok: false; reason: string };

export function decodeCleartexts(cleartexts: string): DecodedAggregates {
    if (!cleartexts.startsWith('0x')) {
        return { ok: false, reason: 'cleartexts must be 0x-prefixed' };
    }

    const body = cleartexts.slice(2);
    if (!HEX_BODY.test(body)) {
        return { ok: false, reason: 'cleartexts contain non-hex characters' };
    }
    if (body.length !== WORD_HEX_LENGTH * 2) {
        return { ok: false, reason: `expected ${WORD_HEX_LENGTH * 2} hex characters, got ${body.length}` };
    }

    const count = BigInt(`0x${body.slice(0, WORD_HEX_LENGTH)}`);
    const sum = BigInt(`0x${body.slice(WORD_HEX_LENGTH)}`);

    if (count > UINT32_MAX || sum > UINT32_MAX) {
        return { ok: false, reason: 'decoded aggregate exceeds uint32 range' };
    }

    return { ok: true, count: Number(count), sum: Number(sum) };
}

export function encodeCleartexts(count: number, sum: number): string {
    return `0x${toWord(count)}${toWord(sum)}`;
}

function toWord(value: number): string {
    if (!Number.isSafeInteger(value) || value < 0) {
        throw new RangeError(`Cannot encode ${value} as an unsigned word`);
    }
    return value.toString(16).padStart(WORD_HEX_LENGTH, '0');
}
