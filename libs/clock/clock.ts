/**
 * Time source shared by every lifecycle component.
 * Values are epoch milliseconds and never decrease.
 */
export interface Clock {
    now(): number;
}

/**
 * Wall clock that clamps backwards jumps of the host clock.
 */
export class SystemClock implements Clock {
    private last = 0;

    now(): number {
        const current = Date.now();
        if (current > this.last) {
            this.last = current;
        }
        return this.last;
    }
}

/**
 * Clock advanced explicitly. Used by tests and replays.
 */
export class ManualClock implements Clock {
    constructor(private current: number = 0) {
        if (!Number.isSafeInteger(current) || current < 0) {
            throw new Error(`ManualClock start must be a non-negative integer, got ${current}`);
        }
    }

    now(): number {
        return this.current;
    }

    advance(ms: number): number {
        if (!Number.isSafeInteger(ms) || ms < 0) {
            throw new Error(`ManualClock can only move forward, got ${ms}ms`);
        }
        this.current += ms;
        return this.current;
    }

    set(timestamp: number): number {
        if (timestamp < this.current) {
            throw new Error(`ManualClock cannot move backwards from ${this.current} to ${timestamp}`);
        }
        this.current = timestamp;
        return this.current;
    }
}

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
