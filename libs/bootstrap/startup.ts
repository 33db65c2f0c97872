import type pg from "pg";
import { logger } from "../logging/logger.js";
import { Clock, SystemClock } from "../clock/clock.js";
import { RoleRegistry } from "../auth/roleRegistry.js";
import { InMemoryGroupLedger } from "../ledger/InMemoryGroupLedger.js";
import type { EncryptedArithmetic } from "../ledger/groupLedger.js";
import { HmacProofVerifier } from "../oracle/proofVerifier.js";
import { OracleOutbox } from "../oracle/oracleGateway.js";
import { OracleRelayer, OracleTransport } from "../oracle/OracleRelayer.js";
import { RevealCoordinator } from "../reveal/RevealCoordinator.js";
import type { RevealOutcome } from "../reveal/types.js";
import { TimeoutSweepWorker } from "../repair/TimeoutSweepWorker.js";
import { RevealAuditTrail } from "../audit/logger.js";
import { AuditSink, InMemoryAuditSink } from "../audit/sink.js";
import { PgAuditSink } from "../audit/PgAuditSink.js";
import { asQueryable, createAuditPool } from "../db/pool.js";
import { parseRevealCallback } from "../validation/zod-middleware.js";
import type { Env } from "./config-guard.js";
import type { RevealConfig } from "./config/reveal-config.js";

export interface RuntimeDependencies {
    readonly transport: OracleTransport;
    readonly arithmetic: EncryptedArithmetic;
    readonly clock?: Clock;
    /** Overrides the sink selected by `config.auditSink`. */
    readonly auditSink?: AuditSink;
    /** Source of the AUDIT_DB_* variables when the postgres sink is selected. */
    readonly env?: Env;
}

export interface RevealRuntime {
    readonly coordinator: RevealCoordinator;
    readonly roles: RoleRegistry;
    readonly ledger: InMemoryGroupLedger;
    readonly outbox: OracleOutbox;
    readonly auditTrail: RevealAuditTrail;
    readonly auditSink: AuditSink;
    readonly sweeper: TimeoutSweepWorker;
    readonly relayer: OracleRelayer;
    /** Validates a raw oracle callback body and submits it. */
    handleOracleCallback(body: unknown): RevealOutcome;
    start(): void;
    stop(): Promise<void>;
}

/**
 * Wires the reveal lifecycle and its background workers.
 * Nothing runs until start() is called.
 */
export function createRevealRuntime(config: RevealConfig, deps: RuntimeDependencies): RevealRuntime {
    const clock = deps.clock ?? new SystemClock();
    const roles = new RoleRegistry(config.ownerIdentity);
    const ledger = new InMemoryGroupLedger(clock, roles, deps.arithmetic);
    const outbox = new OracleOutbox(clock);

    const coordinator = new RevealCoordinator({
        clock,
        ledger,
        authorizer: roles,
        gateway: outbox,
        verifier: new HmacProofVerifier(config.oracleVerificationKey),
        workerId: config.workerId,
        settings: {
            decryptionTimeoutMs: config.decryptionTimeoutMs,
            maxRefundWindowMs: config.maxRefundWindowMs,
            callbackTarget: config.oracleCallbackTarget,
            obfuscation: config.obfuscation
        }
    });

    let pool: pg.Pool | null = null;
    let auditSink = deps.auditSink;
    if (!auditSink) {
        if (config.auditSink === 'postgres') {
            pool = createAuditPool(deps.env ?? process.env);
            auditSink = new PgAuditSink(asQueryable(pool));
        } else {
            auditSink = new InMemoryAuditSink();
        }
    }

    const auditTrail = new RevealAuditTrail(auditSink);
    const detachAudit = auditTrail.attach(coordinator.events);

    const sweeper = new TimeoutSweepWorker(coordinator, config.sweepIntervalMs);
    const relayer = new OracleRelayer(outbox, deps.transport, {
        intervalMs: config.relayIntervalMs,
        maxAttempts: config.relayMaxAttempts
    });

    let running = false;

    return {
        coordinator,
        roles,
        ledger,
        outbox,
        auditTrail,
        auditSink,
        sweeper,
        relayer,

        handleOracleCallback(body: unknown): RevealOutcome {
            const callback = parseRevealCallback(body);
            return coordinator.submitRevealResult(callback.requestId, callback.cleartexts, callback.proof);
        },

        start(): void {
            if (running) return;
            running = true;
            sweeper.start();
            relayer.start();
            logger.info({ workerId: config.workerId, auditSink: config.auditSink }, "Reveal runtime started");
        },

        async stop(): Promise<void> {
            if (running) {
                running = false;
                sweeper.stop();
                relayer.stop();
            }
            detachAudit();
            await auditTrail.flush();
            if (pool) {
                await pool.end();
                pool = null;
            }
            logger.info("Reveal runtime stopped");
        }
    };
}
