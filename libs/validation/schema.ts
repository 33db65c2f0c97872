import { z } from 'zod';

/**
 * Input Validation Framework
 * Central schema definitions for everything that crosses the system boundary.
 */

const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;

// --- Configuration ---

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const RevealEnvSchema = z.object({
    DECRYPTION_TIMEOUT_SECONDS: positiveInt(24 * 60 * 60),
    MAX_REFUND_WINDOW_SECONDS: positiveInt(48 * 60 * 60),
    PRECISION_SCALE: positiveInt(1000),
    SMALL_SAMPLE_THRESHOLD: positiveInt(5),
    NOISE_RANGE: z.coerce.number().int().min(2).default(1000),
    MAX_SCALE_VALUE: positiveInt(1_000_000),
    ORACLE_CALLBACK_TARGET: z.string().min(1).default('reveal-worker/submitRevealResult'),
    ORACLE_VERIFICATION_KEY: z.string().min(8),
    OWNER_IDENTITY: z.string().min(1).max(128),
    SWEEP_INTERVAL_MS: positiveInt(60_000),
    RELAY_INTERVAL_MS: positiveInt(500),
    RELAY_MAX_ATTEMPTS: positiveInt(5),
    WORKER_ID: z.coerce.number().int().min(0).max(1023).default(0),
    AUDIT_SINK: z.enum(['memory', 'postgres']).default('memory'),
}).refine(
    env => env.MAX_REFUND_WINDOW_SECONDS > env.DECRYPTION_TIMEOUT_SECONDS,
    { message: 'MAX_REFUND_WINDOW_SECONDS must be strictly longer than DECRYPTION_TIMEOUT_SECONDS', path: ['MAX_REFUND_WINDOW_SECONDS'] }
).refine(
    env => env.NOISE_RANGE < env.MAX_SCALE_VALUE * env.PRECISION_SCALE,
    { message: 'NOISE_RANGE must be smaller than MAX_SCALE_VALUE * PRECISION_SCALE', path: ['NOISE_RANGE'] }
);

export type RevealEnv = z.infer<typeof RevealEnvSchema>;

// --- Oracle Callback ---

export const RevealCallbackSchema = z.object({
    requestId: z.string().regex(/^\d{1,20}$/),
    cleartexts: z.string().regex(HEX_PATTERN).max(2 + 64 * 8),
    proof: z.string().regex(HEX_PATTERN).max(2 + 64 * 4),
});

export type RevealCallback = z.infer<typeof RevealCallbackSchema>;

// --- Group Registry ---

export const GroupCategorySchema = z.enum(['HISTORY', 'ART', 'SCIENCE', 'CULTURE', 'TECHNOLOGY', 'NATURE']);

export const CreateGroupSchema = z.object({
    name: z.string().trim().min(1).max(200),
    category: GroupCategorySchema,
    startsAt: z.number().int().nonnegative(),
    endsAt: z.number().int().nonnegative(),
});

export type CreateGroupInput = z.infer<typeof CreateGroupSchema>;

// --- Participants & Contributions ---

export const RegisterParticipantSchema = z.object({
    age: z.number().int().min(1).max(119),
});

export type RegisterParticipantInput = z.infer<typeof RegisterParticipantSchema>;

export const ContributionSchema = z.object({
    satisfaction: z.number().int().min(1).max(10),
    durationMinutes: z.number().int().min(0).max(0xffffffff),
    interestLevel: z.number().int().min(1).max(5),
});

export type ContributionInput = z.infer<typeof ContributionSchema>;
