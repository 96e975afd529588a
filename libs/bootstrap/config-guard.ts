import { logger } from '../logging/logger.js';
import type { Env } from '../logging/logLevel.js';

export type { Env };

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

export class ConfigurationError extends Error {
    readonly code = 'CONFIG_INVALID';
    readonly violations: readonly string[];

    constructor(violations: readonly string[]) {
        super(`Configuration Guard Violation: ${violations.join('; ')}`);
        this.name = 'ConfigurationError';
        this.violations = violations;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}

/**
 * Rule-based configuration guard.
 * Every rule is evaluated so that all violations are reported at once.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: Env = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(rule.message);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            // Log structure for machine parsing + human readability
            logger.fatal({
                errors,
                remediation: 'Check PREPRO_* environment variables.'
            }, 'Configuration Guard Violation');

            throw new ConfigurationError(errors);
        }

        logger.debug('Configuration guard passed.');
    }
}
