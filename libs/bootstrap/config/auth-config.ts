import { z } from 'zod';
import { ConfigEnv, GuardRule, isProtectedEnv } from '../config-guard.js';

export const MIN_PROTECTED_SECRET_LENGTH = 32;

/**
 * Auth Configuration Guards
 * The signing secret is the only key material; it is never defaulted.
 */
export const AUTH_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'AUTH_SECRET' },
    { type: 'required', name: 'AUTH_DOMAIN' },
    { type: 'required', name: 'AUTH_BASE_URL' },

    {
        type: 'forbidIf',
        name: 'AUTH_SECRET',
        when: env => isProtectedEnv(env) && (env.AUTH_SECRET ?? '').length < MIN_PROTECTED_SECRET_LENGTH,
        message: `AUTH_SECRET must be at least ${MIN_PROTECTED_SECRET_LENGTH} characters in production/staging`,
    },
    {
        type: 'assert',
        check: env => env.AUTH_REISSUE_SOURCE === undefined || ['repository', 'claims'].includes(env.AUTH_REISSUE_SOURCE),
        message: 'AUTH_REISSUE_SOURCE must be "repository" or "claims"',
    }
];

const AuthEnvSchema = z.object({
    AUTH_SECRET: z.string().min(1),
    AUTH_DOMAIN: z.string().trim().min(1).transform(domain => domain.toLowerCase()),
    AUTH_BASE_URL: z.string().url(),
    AUTH_REISSUE_SOURCE: z.enum(['repository', 'claims']).default('repository')
});

export type ReissueSource = 'repository' | 'claims';

export interface AuthConfig {
    readonly secret: string;
    readonly domain: string;
    readonly baseUrl: string;
    readonly reissueSource: ReissueSource;
}

export function loadAuthConfig(env: ConfigEnv = process.env): AuthConfig {
    const parsed = AuthEnvSchema.parse(env);
    return Object.freeze({
        secret: parsed.AUTH_SECRET,
        domain: parsed.AUTH_DOMAIN,
        baseUrl: parsed.AUTH_BASE_URL,
        reissueSource: parsed.AUTH_REISSUE_SOURCE
    });
}
