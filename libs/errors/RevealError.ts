/**
 * RevealError
 * Canonical error for rejected reveal-lifecycle operations.
 * Every rejection happens before any state change.
 */

export type RevealErrorCode =
    // Validation
    | 'GROUP_NOT_FOUND'
    | 'NOT_AUTHORIZED'
    | 'REQUEST_ALREADY_PENDING'
    | 'NO_PARTICIPANTS'
    | 'REQUEST_NOT_FOUND'
    | 'INVALID_INPUT'
    // Double action / state
    | 'ALREADY_FINALIZED'
    | 'NOT_TIMED_OUT'
    | 'NO_REQUEST'
    | 'ALREADY_CLAIMED'
    | 'NOT_ELIGIBLE'
    | 'WINDOW_EXPIRED'
    | 'REENTRANT_CALL'
    | 'STATISTIC_NOT_REVEALED'
    // Group ledger
    | 'INVALID_DATE_RANGE'
    | 'ALREADY_REGISTERED'
    | 'NOT_REGISTERED'
    | 'GROUP_INACTIVE'
    | 'ALREADY_CONTRIBUTED';

const STATUS_CODES: Record<RevealErrorCode, number> = {
    GROUP_NOT_FOUND: 404,
    NOT_AUTHORIZED: 403,
    REQUEST_ALREADY_PENDING: 409,
    NO_PARTICIPANTS: 422,
    REQUEST_NOT_FOUND: 404,
    INVALID_INPUT: 400,
    ALREADY_FINALIZED: 409,
    NOT_TIMED_OUT: 409,
    NO_REQUEST: 404,
    ALREADY_CLAIMED: 409,
    NOT_ELIGIBLE: 409,
    WINDOW_EXPIRED: 410,
    REENTRANT_CALL: 423,
    STATISTIC_NOT_REVEALED: 404,
    INVALID_DATE_RANGE: 400,
    ALREADY_REGISTERED: 409,
    NOT_REGISTERED: 403,
    GROUP_INACTIVE: 409,
    ALREADY_CONTRIBUTED: 409
};

export class RevealError extends Error {
    readonly code: RevealErrorCode;
    readonly statusCode: number;

    constructor(code: RevealErrorCode, message?: string) {
        super(message || `Reveal operation rejected: ${code}`);
        this.name = 'RevealError';
        this.code = code;
        this.statusCode = STATUS_CODES[code];
        Object.setPrototypeOf(this, RevealError.prototype);
    }
}

export function isRevealError(err: unknown, code?: RevealErrorCode): err is RevealError {
    return err instanceof RevealError && (code === undefined || err.code === code);
}
