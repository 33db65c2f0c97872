import { createAuditPool, asQueryable } from "../../libs/db/pool.js";
import { PgAuditSink } from "../../libs/audit/PgAuditSink.js";
import { verifyAuditChain } from "../../libs/audit/integrity.js";
import { logger } from "../../libs/logging/logger.js";

/**
 * Audit Chain Verification
 * Reads reveal_audit_log in insertion order and checks every hash link.
 * Exits non-zero on the first violation.
 */
async function runChainVerification(): Promise<boolean> {
    const pool = createAuditPool();
    try {
        const records = await new PgAuditSink(asQueryable(pool)).readAll();
        const result = verifyAuditChain(records);

        if (!result.valid) {
            logger.error({ violationIndex: result.violationIndex, reason: result.reason }, "Audit chain verification FAILED");
            return false;
        }

        logger.info({ records: records.length }, "Audit chain verified");
        return true;
    } finally {
        await pool.end();
    }
}

runChainVerification()
    .then(valid => process.exit(valid ? 0 : 1))
    .catch(err => {
        logger.fatal(err);
        process.exit(1);
    });
