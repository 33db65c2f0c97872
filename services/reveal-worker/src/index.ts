import { loadRevealConfig } from "../../../libs/bootstrap/config/reveal-config.js";
import { createRevealRuntime } from "../../../libs/bootstrap/startup.js";
import { getComponentLogger, logger } from "../../../libs/logging/logger.js";
import { HandleArithmetic } from "../../../libs/ledger/handleArithmetic.js";
import type { OracleTransport } from "../../../libs/oracle/OracleRelayer.js";

const dispatchLog = getComponentLogger('OracleDispatch');

/**
 * The oracle tails this component's log stream for dispatches and answers
 * through the callback entry point.
 */
const logTransport: OracleTransport = {
    async send(dispatch) {
        dispatchLog.info({ dispatch }, 'Decryption requested');
    }
};

async function main() {
    const config = loadRevealConfig();

    const runtime = createRevealRuntime(config, {
        transport: logTransport,
        arithmetic: new HandleArithmetic()
    });

    runtime.start();
    logger.info({ owner: config.ownerIdentity }, "Reveal worker initialized");

    const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down reveal worker");
        runtime.stop()
            .then(() => process.exit(0))
            .catch(err => {
                logger.fatal(err);
                process.exit(1);
            });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
