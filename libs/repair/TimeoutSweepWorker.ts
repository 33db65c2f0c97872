/**
 * Timeout Sweep Worker
 *
 * Invariant: no request stays PENDING past its decryption timeout for longer
 * than one sweep interval, even when no requester or relayer calls
 * forceTimeout.
 */

import { getComponentLogger } from '../logging/logger.js';
import { isRevealError } from '../errors/RevealError.js';
import type { RevealCoordinator } from '../reveal/RevealCoordinator.js';

const logger = getComponentLogger('TimeoutSweepWorker');

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;
const SWEEP_BATCH_SIZE = 100;

export interface SweepResult {
    scannedCount: number;
    timedOutCount: number;
    errors: string[];
}

export class TimeoutSweepWorker {
    private isRunning = false;
    private intervalHandle: NodeJS.Timeout | null = null;

    constructor(
        private readonly coordinator: RevealCoordinator,
        private readonly intervalMs: number = DEFAULT_SWEEP_INTERVAL_MS
    ) { }

    /**
     * Start the sweep worker
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('TimeoutSweepWorker already running');
            return;
        }

        this.isRunning = true;
        logger.info({ intervalMs: this.intervalMs }, 'TimeoutSweepWorker started');

        // Run immediately, then on interval
        this.runSweepCycle();
        this.intervalHandle = setInterval(() => this.runSweepCycle(), this.intervalMs);
    }

    /**
     * Stop the sweep worker
     */
    public stop(): void {
        this.isRunning = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        logger.info('TimeoutSweepWorker stopped');
    }

    /**
     * Force-timeout every stale pending request, up to one batch
     */
    public runSweepCycle(): SweepResult {
        const result: SweepResult = {
            scannedCount: 0,
            timedOutCount: 0,
            errors: []
        };

        const pending = this.coordinator.listPendingRequests().slice(0, SWEEP_BATCH_SIZE);
        result.scannedCount = pending.length;

        for (const request of pending) {
            try {
                if (!this.coordinator.isTimedOut(request.requestId)) continue;
                this.coordinator.forceTimeout(request.requestId);
                result.timedOutCount += 1;
            } catch (error: unknown) {
                // Another caller finalized it between the scan and the call
                if (isRevealError(error, 'ALREADY_FINALIZED')) continue;
                const errorMessage = error instanceof Error ? error.message : 'Unknown error';
                result.errors.push(errorMessage);
                logger.error({ requestId: request.requestId, error: errorMessage }, 'Sweep timeout failed');
            }
        }

        if (result.timedOutCount > 0) {
            logger.info({
                event: 'SWEEP_CYCLE_COMPLETE',
                scannedCount: result.scannedCount,
                timedOutCount: result.timedOutCount
            });
        }

        return result;
    }

    /**
     * Number of pending requests already past their timeout (for monitoring)
     */
    public getOverdueCount(): number {
        return this.coordinator.listPendingRequests()
            .filter(request => this.coordinator.isTimedOut(request.requestId))
            .length;
    }
}
