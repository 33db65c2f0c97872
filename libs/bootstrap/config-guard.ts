import { logger } from '../logging/logger.js';

export type Env = Record<string, string | undefined>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

export class ConfigViolationError extends Error {
    readonly code = 'CONFIG_VIOLATION';

    constructor(public readonly violations: string[]) {
        super(`Configuration guard violation: ${violations.join('; ')}`);
        this.name = 'ConfigViolationError';
    }
}

/**
 * Hardened Configuration Guard
 * Fail-closed: a missing secret or unsafe combination aborts startup.
 * The caller decides whether to exit the process.
 */
export class ConfigGuard {
    static enforce(rules: GuardRule[], env: Env = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. Secrets have no defaults."
            }, "Configuration Guard Violation");

            throw new ConfigViolationError(errors);
        }

        logger.debug("Configuration guard passed.");
    }
}
