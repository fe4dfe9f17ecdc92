import { Claims, Identity } from '../context/identity.js';

export const SESSION_TOKEN_TTL_SECONDS = 7 * 24 * 60 * 60;
export const RECOVERY_TOKEN_TTL_SECONDS = 24 * 60 * 60;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function epochSeconds(at: Date): number {
    return Math.floor(at.getTime() / 1000);
}

/**
 * Build the canonical claim set for an identity.
 * Pure: no I/O, the result is frozen.
 */
export function buildClaims(identity: Identity, lifetimeSeconds: number, now: Date): Claims {
    return Object.freeze({
        sub: String(identity.id),
        email: identity.email.toLowerCase(),
        hubId: identity.hubId,
        name: identity.name ?? '',
        roles: Object.freeze([...identity.roles]),
        exp: epochSeconds(now) + lifetimeSeconds
    });
}

/**
 * Copy decoded claims with a recomputed expiry. Never carries the old exp over.
 */
export function renewClaims(claims: Claims, lifetimeSeconds: number, now: Date): Claims {
    return Object.freeze({
        sub: claims.sub,
        email: claims.email,
        hubId: claims.hubId,
        name: claims.name,
        roles: Object.freeze([...claims.roles]),
        exp: epochSeconds(now) + lifetimeSeconds
    });
}

export function hasRole(claims: Claims, role: string): boolean {
    return claims.roles.includes(role);
}

/** Parse `sub` as a positive integer id, or null. */
export function subjectId(claims: Claims): number | null {
    if (!/^[1-9][0-9]*$/.test(claims.sub)) {
        return null;
    }
    const id = Number(claims.sub);
    return Number.isSafeInteger(id) ? id : null;
}
