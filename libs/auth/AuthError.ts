/**
 * AuthError
 * Throwable form of an authentication/authorization failure code.
 * Core operations return typed results; boundary code that prefers exceptions
 * raises this instead, keeping unauthenticated (401) apart from forbidden (403).
 */

export type TokenFailureCode =
    | 'TOKEN_EXPIRED'
    | 'TOKEN_MALFORMED'
    | 'TOKEN_BAD_SIGNATURE';

export type AuthFailureCode =
    | 'INVALID_CREDENTIALS'
    | TokenFailureCode
    | 'MISSING_ROLE'
    | 'WRONG_HUB'
    | 'SELF_ACTION_FORBIDDEN'
    | 'IDENTITY_NOT_FOUND';

const UNAUTHENTICATED_CODES: ReadonlySet<AuthFailureCode> = new Set<AuthFailureCode>([
    'INVALID_CREDENTIALS',
    'TOKEN_EXPIRED',
    'TOKEN_MALFORMED',
    'TOKEN_BAD_SIGNATURE'
]);

export function isUnauthenticated(code: AuthFailureCode): boolean {
    return UNAUTHENTICATED_CODES.has(code);
}

export function statusCodeFor(code: AuthFailureCode): number {
    if (isUnauthenticated(code)) return 401;
    if (code === 'IDENTITY_NOT_FOUND') return 404;
    return 403;
}

export class AuthError extends Error {
    readonly code: AuthFailureCode;
    readonly statusCode: number;

    constructor(code: AuthFailureCode, message?: string) {
        super(message || `Authorization failure: ${code}`);
        this.name = 'AuthError';
        this.code = code;
        this.statusCode = statusCodeFor(code);
        Object.setPrototypeOf(this, AuthError.prototype);
    }
}
