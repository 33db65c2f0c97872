import pg from 'pg';
import { ConfigGuard, Env } from '../bootstrap/config-guard.js';
import { AUDIT_DB_CONFIG_GUARDS } from '../bootstrap/config/db-config.js';

const { Pool } = pg;

/**
 * Minimal query surface the audit sink depends on.
 * Rows are untrusted until parsed.
 */
export type Queryable = {
    query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
};

/**
 * Hardened PostgreSQL pool for the audit log.
 * Configuration is enforced before the pool is built; there are no silent fallbacks.
 */
export function createAuditPool(env: Env = process.env): pg.Pool {
    ConfigGuard.enforce(AUDIT_DB_CONFIG_GUARDS, env);

    const isProtectedEnv = env.NODE_ENV === 'production' || env.NODE_ENV === 'staging';
    if (isProtectedEnv && env.AUDIT_DB_SSL === 'false') {
        throw new Error("CRITICAL: AUDIT_DB_SSL=false is forbidden in production/staging.");
    }

    const poolMax = env.AUDIT_DB_POOL_MAX ? parseInt(env.AUDIT_DB_POOL_MAX, 10) : 5;
    const useTls = isProtectedEnv || env.AUDIT_DB_SSL === 'true';

    return new Pool({
        host: env.AUDIT_DB_HOST,
        port: parseInt(env.AUDIT_DB_PORT ?? '', 10),
        user: env.AUDIT_DB_USER,
        password: env.AUDIT_DB_PASSWORD,
        database: env.AUDIT_DB_NAME,
        max: Number.isFinite(poolMax) ? poolMax : 5,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
        ssl: useTls
            ? { rejectUnauthorized: true, ca: env.AUDIT_DB_CA_CERT }
            : false
    });
}

export function asQueryable(pool: pg.Pool): Queryable {
    return {
        query: async (text, params) => {
            const result = await pool.query(text, params);
            return { rows: result.rows, rowCount: result.rowCount };
        }
    };
}
