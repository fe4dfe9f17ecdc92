import { logger } from '../logging/logger.js';

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string }
    | { type: 'forbidIf'; name: string; when: (env: ConfigEnv) => boolean; message: string }
    | { type: 'assert'; check: (env: ConfigEnv) => boolean; message: string };

const PROTECTED_ENVS = new Set(['production', 'staging']);

export function isProtectedEnv(env: ConfigEnv): boolean {
    return PROTECTED_ENVS.has(env.NODE_ENV ?? 'development');
}

/**
 * Hardened Configuration Guard
 * Fail-closed: a missing value or unsafe pattern is a violation.
 */
export class ConfigGuard {
    /**
     * Evaluate rules and return every violation. Never exits.
     */
    static check(rules: readonly GuardRule[], env: ConfigEnv = process.env): string[] {
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
                const message = err instanceof Error ? err.message : String(err);
                errors.push(`Check failed for rule: ${message}`);
            }
        }

        return errors;
    }

    static enforce(rules: readonly GuardRule[], env: ConfigEnv = process.env): void {
        const errors = ConfigGuard.check(rules, env);

        if (errors.length > 0) {
            // Log structure for machine parsing + human readability
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
