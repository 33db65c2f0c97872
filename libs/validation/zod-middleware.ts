import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { RevealError } from '../errors/RevealError.js';
import { RevealCallback, RevealCallbackSchema } from './schema.js';

/**
 * Validation gate
 * Returns the parsed value or throws INVALID_INPUT. The raw payload is never
 * logged, only the failing paths.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails,
        }, "Input Validation Failure");

        throw new RevealError('INVALID_INPUT', `Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};

/**
 * Parses a raw oracle callback body before it reaches the coordinator.
 */
export function parseRevealCallback(body: unknown): RevealCallback {
    return validate(RevealCallbackSchema, body, 'OracleCallback');
}
