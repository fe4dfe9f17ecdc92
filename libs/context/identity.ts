/**
 * Hubgate Identity Model
 *
 * Identity is owned by the persistence layer; the authority only reads it.
 * Claims are the only data carried inside a signed token.
 */

/** Reserved role name that authorizes every admin policy. */
export const ADMIN_ROLE = 'admin';

/** Role id 1 is the seeded admin role and can never be deleted. */
export const PROTECTED_ROLE_ID = 1;

/**
 * Stored identity as loaded from the repository.
 * Immutable after load.
 */
export interface Identity {
    readonly id: number;
    /** Unique within the hub */
    readonly email: string;
    readonly hubId: number;
    readonly name: string | null;
    readonly passwordHash: string;
    /** Assigned role names, in storage order */
    readonly roles: readonly string[];
}

/**
 * Canonical claim set derived from an Identity at issue time.
 */
export interface Claims {
    /** Identity id, stringified */
    readonly sub: string;
    /** Lower-cased email */
    readonly email: string;
    readonly hubId: number;
    /** Display name, empty string when unset */
    readonly name: string;
    readonly roles: readonly string[];
    /** Expiry, seconds since epoch */
    readonly exp: number;
}
