/**
 * Token Codec
 * Signed, expiring claim sets as compact HS256 JWS.
 *
 * Failure classification:
 * - TOKEN_MALFORMED: not three non-empty dot-separated segments, or a
 *   correctly signed payload that does not match the claims schema.
 * - TOKEN_BAD_SIGNATURE: three segments, but a segment is not canonical
 *   base64url, or the protected header or signature does not verify against
 *   the secret. Changing any character inside a segment of a valid token
 *   lands here, whatever the replacement character.
 * - TOKEN_EXPIRED: correctly signed, exp <= now. No clock tolerance.
 *
 * Canonical means the segment re-encodes to itself. Decoders ignore the
 * unused low bits of a final character, so a non-canonical segment can carry
 * the same bytes as the signed one.
 */

import { SignJWT, jwtVerify, errors, base64url, JWTPayload } from 'jose';
import { Claims } from '../context/identity.js';
import { TokenPayload, TokenPayloadSchema } from '../validation/claimsSchema.js';
import { TokenFailureCode } from './AuthError.js';

const TOKEN_ALGORITHM = 'HS256';

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

export type TokenDecodeResult =
    | { ok: true; claims: Claims }
    | { ok: false; reason: TokenFailureCode };

function signingKey(secret: string): Uint8Array {
    if (secret.length === 0) {
        throw new Error('Token signing secret must not be empty');
    }
    return new TextEncoder().encode(secret);
}

function splitCompact(token: string): string[] | null {
    const segments = token.split('.');
    return segments.length === 3 && segments.every(segment => segment.length > 0) ? segments : null;
}

function isCanonicalSegment(segment: string): boolean {
    if (!SEGMENT_PATTERN.test(segment)) return false;
    try {
        return base64url.encode(base64url.decode(segment)) === segment;
    } catch {
        return false;
    }
}

function toPayload(claims: Claims): TokenPayload {
    return {
        sub: claims.sub,
        email: claims.email,
        hub_id: claims.hubId,
        name: claims.name,
        roles: [...claims.roles],
        exp: claims.exp,
    };
}

function toClaims(payload: TokenPayload): Claims {
    return Object.freeze({
        sub: payload.sub,
        email: payload.email,
        hubId: payload.hub_id,
        name: payload.name,
        roles: Object.freeze([...payload.roles]),
        exp: payload.exp,
    });
}

function classifyVerificationError(error: unknown): TokenFailureCode {
    if (error instanceof errors.JWTExpired) return 'TOKEN_EXPIRED';
    // Only reachable once the signature has verified.
    if (error instanceof errors.JWTInvalid || error instanceof errors.JWTClaimValidationFailed) {
        return 'TOKEN_MALFORMED';
    }
    return 'TOKEN_BAD_SIGNATURE';
}

/**
 * Sign a claim set. Deterministic for a given claim set and secret.
 */
export async function encodeToken(claims: Claims, secret: string): Promise<string> {
    return new SignJWT(toPayload(claims))
        .setProtectedHeader({ alg: TOKEN_ALGORITHM })
        .sign(signingKey(secret));
}

/**
 * Verify and decode a token. Never throws on bad input.
 */
export async function decodeToken(
    token: string,
    secret: string,
    now: Date = new Date()
): Promise<TokenDecodeResult> {
    const segments = splitCompact(token);
    if (segments === null) {
        return { ok: false, reason: 'TOKEN_MALFORMED' };
    }
    if (!segments.every(isCanonicalSegment)) {
        return { ok: false, reason: 'TOKEN_BAD_SIGNATURE' };
    }

    let payload: JWTPayload;
    try {
        const verified = await jwtVerify(token, signingKey(secret), {
            algorithms: [TOKEN_ALGORITHM],
            currentDate: now,
            requiredClaims: ['sub', 'exp'],
        });
        payload = verified.payload;
    } catch (error: unknown) {
        if (!(error instanceof errors.JOSEError)) {
            throw error;
        }
        return { ok: false, reason: classifyVerificationError(error) };
    }

    const parsed = TokenPayloadSchema.safeParse(payload);
    if (!parsed.success) {
        return { ok: false, reason: 'TOKEN_MALFORMED' };
    }

    return { ok: true, claims: toClaims(parsed.data) };
}
