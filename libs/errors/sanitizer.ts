import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Error Information Disclosure Prevention
 * Sanitizes internal errors by wrapping them in a generic message
 * and providing a unique IncidentID for log correlation.
 */

export class RevealSystemError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly errorCode?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; errorCode?: string }
    ) {
        super(publicMessage);
        this.name = 'RevealSystemError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.errorCode = options?.errorCode;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized RevealSystemError.
     */
    sanitize: (err: unknown, contextLabel: string): RevealSystemError => {
        if (err instanceof RevealSystemError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let errorCode: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
            const code: unknown = Reflect.get(err, 'code');
            errorCode = typeof code === 'string' ? code : undefined;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else {
            originalErrorMessage = String(err);
        }

        return new RevealSystemError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, errorCode }
        );
    }
};
