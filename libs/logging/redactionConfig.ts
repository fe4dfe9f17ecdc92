/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs in clear text.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'password', '*.password',
    'passwordHash', '*.passwordHash',
    'password_hash', '*.password_hash',
    'secret', '*.secret',

    // Tokens (Root and Nested)
    'token', '*.token',
    'jwt', '*.jwt',
    'rawToken', '*.rawToken',
    'recoveryUrl', '*.recoveryUrl',
    'recovery_url', '*.recovery_url'
];

export const REDACT_CENSOR = '[REDACTED]';
