/**
 * Canonical Reveal Audit Schema (v1)
 *
 * One record per lifecycle event, hash-chained in emission order.
 */

import { z } from 'zod';

export const AUDIT_EVENT_TYPES = [
    'RevealRequested',
    'RevealCompleted',
    'RevealFailed',
    'RevealTimedOut',
    'RefundClaimed'
] as const;

export const GENESIS_HASH = '0'.repeat(64);

const HashSchema = z.string().regex(/^[a-f0-9]{64}$/);

export const RevealAuditRecordSchema = z.object({
    eventId: z.string().uuid(),
    eventType: z.enum(AUDIT_EVENT_TYPES),
    timestamp: z.string().datetime(),
    requestId: z.string(),
    groupId: z.number().int(),
    actor: z.string().nullable(),
    details: z.record(z.union([z.string(), z.number(), z.null()])),
    integrity: z.object({
        prevHash: HashSchema,   // Hash of the immediately preceding record
        hash: HashSchema,       // SHA-256(canonical(record without integrity) || prevHash)
    }),
});

export type RevealAuditRecordV1 = z.infer<typeof RevealAuditRecordSchema>;

export type UnsignedAuditRecord = Omit<RevealAuditRecordV1, 'integrity'>;
