/**
 * Monotonic request id allocation.
 *
 * Snowflake layout: [41-bit timestamp][10-bit worker][12-bit sequence],
 * rendered as a decimal string. Allocation is synchronous: when the clock
 * stalls or steps back, or a millisecond's sequence is exhausted, the
 * allocator borrows the next logical millisecond instead of waiting.
 *
 * Invariant: every id is strictly greater than the previous one.
 */

import { Clock } from '../clock/clock.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('RequestIdAllocator');

// Custom epoch: 2024-01-01 00:00:00 UTC (reduces timestamp size)
export const CUSTOM_EPOCH = new Date('2024-01-01T00:00:00.000Z').getTime();

const SEQUENCE_BITS = 12;
const WORKER_BITS = 10;
const MAX_SEQUENCE = (1 << SEQUENCE_BITS) - 1; // 4095
const MAX_WORKER_ID = (1 << WORKER_BITS) - 1; // 1023

export type RequestId = string;

export class RequestIdAllocator {
    private lastTimestamp = -1;
    private sequence = 0;

    constructor(
        private readonly clock: Clock,
        private readonly workerId: number = 0
    ) {
        if (!Number.isInteger(workerId) || workerId < 0 || workerId > MAX_WORKER_ID) {
            throw new Error(`Worker ID must be 0-${MAX_WORKER_ID}, got ${workerId}`);
        }
    }

    public next(): RequestId {
        return this.nextBigInt().toString();
    }

    public nextBigInt(): bigint {
        const observed = this.clock.now() - CUSTOM_EPOCH;
        if (observed < 0) {
            throw new Error(`Clock reads before the id epoch (${this.clock.now()})`);
        }

        let timestamp = observed;
        if (timestamp < this.lastTimestamp) {
            logger.warn({
                event: 'CLOCK_DRIFT_DETECTED',
                lastTimestamp: this.lastTimestamp,
                currentTimestamp: observed,
                driftMs: this.lastTimestamp - observed
            });
            timestamp = this.lastTimestamp;
        }

        if (timestamp === this.lastTimestamp) {
            this.sequence = (this.sequence + 1) & MAX_SEQUENCE;
            // Sequence exhausted: borrow the next millisecond
            if (this.sequence === 0) {
                timestamp += 1;
            }
        } else {
            this.sequence = 0;
        }

        this.lastTimestamp = timestamp;

        return (BigInt(timestamp) << BigInt(SEQUENCE_BITS + WORKER_BITS)) |
            (BigInt(this.workerId) << BigInt(SEQUENCE_BITS)) |
            BigInt(this.sequence);
    }
}

/**
 * Extracts the worker id encoded in a request id.
 */
export function workerOf(requestId: RequestId): number {
    return Number((BigInt(requestId) >> BigInt(SEQUENCE_BITS)) & BigInt(MAX_WORKER_ID));
}
