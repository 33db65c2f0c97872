import { z } from 'zod';
import type { Queryable } from '../db/pool.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { RevealAuditRecordSchema, RevealAuditRecordV1 } from './schema.js';
import type { AuditSink } from './sink.js';

const RecordRowSchema = z.object({ record: RevealAuditRecordSchema });

/**
 * PostgreSQL-backed audit sink. See schema/reveal_audit_log.sql.
 * Rows are re-validated on read; a row that does not parse is an integrity failure.
 */
export class PgAuditSink implements AuditSink {
    constructor(private readonly db: Queryable) { }

    async latestHash(): Promise<string | null> {
        const result = await this.db.query(
            'SELECT record FROM reveal_audit_log ORDER BY seq DESC LIMIT 1'
        );
        const row = result.rows[0];
        if (row === undefined) return null;
        return this.parse(row).integrity.hash;
    }

    async append(record: RevealAuditRecordV1): Promise<void> {
        try {
            await this.db.query(
                `INSERT INTO reveal_audit_log (event_id, event_type, request_id, group_id, record)
                 VALUES ($1, $2, $3, $4, $5)`,
                [record.eventId, record.eventType, record.requestId, record.groupId, JSON.stringify(record)]
            );
        } catch (error) {
            throw ErrorSanitizer.sanitize(error, 'PgAuditSink:Append');
        }
    }

    async readAll(): Promise<RevealAuditRecordV1[]> {
        const result = await this.db.query('SELECT record FROM reveal_audit_log ORDER BY seq ASC');
        return result.rows.map(row => this.parse(row));
    }

    private parse(row: unknown): RevealAuditRecordV1 {
        const parsed = RecordRowSchema.safeParse(row);
        if (!parsed.success) {
            throw new Error(`Audit row failed schema validation: ${parsed.error.message}`);
        }
        return parsed.data.record;
    }
}
