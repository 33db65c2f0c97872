/**
 * Oracle Relayer
 *
 * Drains the oracle outbox on an interval and hands each dispatch to the
 * transport. A failed delivery is requeued until it reaches maxAttempts,
 * then dropped; the request it belongs to still times out normally.
 */

import { getComponentLogger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { DecryptionDispatch, OracleOutbox } from './oracleGateway.js';

const logger = getComponentLogger('OracleRelayer');

const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_INTERVAL_MS = 500;
const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Transport to the oracle. Resolves once the oracle accepted the dispatch;
 * the result arrives later through the callback entry point.
 */
export interface OracleTransport {
    send(dispatch: DecryptionDispatch): Promise<void>;
}

export interface RelayerOptions {
    readonly batchSize?: number;
    readonly intervalMs?: number;
    readonly maxAttempts?: number;
}

export interface RelayResult {
    delivered: number;
    requeued: number;
    dropped: number;
    errors: string[];
}

export class OracleRelayer {
    private isRunning = false;
    private cycleInProgress = false;
    private intervalHandle: NodeJS.Timeout | null = null;
    private readonly batchSize: number;
    private readonly intervalMs: number;
    private readonly maxAttempts: number;

    constructor(
        private readonly outbox: OracleOutbox,
        private readonly transport: OracleTransport,
        options: RelayerOptions = {}
    ) {
        this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
        this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
        this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    }

    /**
     * Start the relay loop
     */
    public start(): void {
        if (this.isRunning) {
            logger.warn('OracleRelayer already running');
            return;
        }

        this.isRunning = true;
        logger.info({ intervalMs: this.intervalMs }, 'OracleRelayer started');

        this.intervalHandle = setInterval(() => void this.tick(), this.intervalMs);
        void this.tick();
    }

    /**
     * Stop the relay loop
     */
    public stop(): void {
        this.isRunning = false;
        if (this.intervalHandle) {
            clearInterval(this.intervalHandle);
            this.intervalHandle = null;
        }
        logger.info('OracleRelayer stopped');
    }

    private async tick(): Promise<void> {
        if (!this.isRunning || this.cycleInProgress) return;
        this.cycleInProgress = true;
        try {
            await this.runRelayCycle();
        } finally {
            this.cycleInProgress = false;
        }
    }

    /**
     * Deliver one batch from the outbox
     */
    public async runRelayCycle(): Promise<RelayResult> {
        const result: RelayResult = {
            delivered: 0,
            requeued: 0,
            dropped: 0,
            errors: []
        };

        const batch = this.outbox.claimBatch(this.batchSize);

        for (const entry of batch) {
            entry.attempts += 1;
            try {
                await this.transport.send(entry.dispatch);
                result.delivered += 1;
                logger.info({
                    requestId: entry.dispatch.requestId,
                    groupId: entry.dispatch.groupId,
                    attempts: entry.attempts
                }, 'Decryption dispatch delivered');
            } catch (error: unknown) {
                const errorMessage = error instanceof Error ? error.message : 'Unknown error';
                entry.lastError = errorMessage;
                result.errors.push(errorMessage);

                if (entry.attempts >= this.maxAttempts) {
                    result.dropped += 1;
                    const incident = ErrorSanitizer.sanitize(error, 'OracleRelayer:Delivery');
                    logger.error({
                        requestId: entry.dispatch.requestId,
                        attempts: entry.attempts,
                        incidentId: incident.incidentId
                    }, 'Decryption dispatch dropped after max attempts');
                } else {
                    result.requeued += 1;
                    this.outbox.requeue(entry);
                    logger.warn({
                        requestId: entry.dispatch.requestId,
                        attempts: entry.attempts,
                        error: errorMessage
                    }, 'Decryption dispatch failed, requeued');
                }
            }
        }

        if (batch.length > 0) {
            logger.debug({ ...result, errors: result.errors.length }, 'Relay cycle complete');
        }

        return result;
    }
}
