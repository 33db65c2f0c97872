import { RevealError } from '../errors/RevealError.js';

/**
 * Scoped mutual exclusion around state-mutating entry points.
 *
 * One guard is shared by every mutating operation of a coordinator, so a
 * call made from inside another (for example from a proof verifier) is
 * rejected instead of interleaving. Released on every exit path.
 */
export class ReentrancyGuard {
    private holder: string | null = null;

    run<T>(operation: string, fn: () => T): T {
        if (this.holder !== null) {
            throw new RevealError(
                'REENTRANT_CALL',
                `Reentrant call detected: ${operation} invoked while ${this.holder} is in progress`
            );
        }

        this.holder = operation;
        try {
            return fn();
        } finally {
            this.holder = null;
        }
    }

    isHeld(): boolean {
        return this.holder !== null;
    }

    currentHolder(): string | null {
        return this.holder;
    }
}
