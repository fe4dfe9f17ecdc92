import { z } from 'zod';
import { ConfigEnv, GuardRule, isProtectedEnv } from '../config-guard.js';

/**
 * DB Configuration Guards
 * Enforces strict presence of database connection parameters.
 */
export const DB_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'DB_HOST' },
    { type: 'required', name: 'DB_PORT' },
    { type: 'required', name: 'DB_USER' },
    { type: 'required', name: 'DB_PASSWORD' },
    { type: 'required', name: 'DB_NAME' },

    // Guard-level TLS enforcement (fail-closed)
    {
        type: 'assert',
        check: env => !isProtectedEnv(env) || !!env.DB_CA_CERT,
        message: 'DB_CA_CERT is required in production/staging',
    },
    {
        type: 'forbidIf',
        name: 'DB_SSL_QUERY',
        when: env => isProtectedEnv(env) && env.DB_SSL_QUERY === 'false',
        message: 'DB_SSL_QUERY=false is forbidden in production/staging',
    }
];

const DbEnvSchema = z.object({
    DB_HOST: z.string().min(1),
    DB_PORT: z.coerce.number().int().positive(),
    DB_USER: z.string().min(1),
    DB_PASSWORD: z.string().min(1),
    DB_NAME: z.string().min(1),
    DB_POOL_MAX: z.coerce.number().int().positive().default(20),
    DB_CA_CERT: z.string().optional(),
    DB_SSL_QUERY: z.enum(['true', 'false']).optional()
});

export interface DbConfig {
    readonly host: string;
    readonly port: number;
    readonly user: string;
    readonly password: string;
    readonly database: string;
    readonly poolMax: number;
    /** PEM bundle; TLS is enabled when present in a protected env or when DB_SSL_QUERY=true */
    readonly ssl: { readonly ca?: string } | false;
}

/**
 * Parse DB settings. Run DB_CONFIG_GUARDS first; this only shapes values.
 */
export function loadDbConfig(env: ConfigEnv = process.env): DbConfig {
    const parsed = DbEnvSchema.parse(env);
    const tls = isProtectedEnv(env) || parsed.DB_SSL_QUERY === 'true';

    return Object.freeze({
        host: parsed.DB_HOST,
        port: parsed.DB_PORT,
        user: parsed.DB_USER,
        password: parsed.DB_PASSWORD,
        database: parsed.DB_NAME,
        poolMax: parsed.DB_POOL_MAX,
        ssl: tls ? Object.freeze({ ca: parsed.DB_CA_CERT }) : false
    });
}
