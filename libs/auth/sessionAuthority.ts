/**
 * Session Authority
 *
 * Login: Lookup -> Verify -> Issue -> Bind. A lookup miss and a password
 * mismatch end in the same INVALID_CREDENTIALS result.
 *
 * Re-issuance never carries the old expiry over; every new token lives
 * SESSION_TOKEN_TTL_SECONDS from the moment it is issued.
 */

import { Claims, Identity } from '../context/identity.js';
import { SessionStore } from '../context/sessionStore.js';
import { IdentityRepository } from '../identity/repository.js';
import { ReissueSource } from '../bootstrap/config/auth-config.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { CredentialVerifier } from './credentialVerifier.js';
import { buildClaims, Clock, renewClaims, SESSION_TOKEN_TTL_SECONDS, subjectId, systemClock } from './claims.js';
import { decodeToken, encodeToken } from './tokenCodec.js';
import { TokenFailureCode } from './AuthError.js';

export interface LoginCredentials {
    readonly email: string;
    readonly password: string;
    readonly hubId: number;
}

export type LoginResult =
    | { success: true; token: string; claims: Claims }
    | { success: false; reason: 'INVALID_CREDENTIALS' };

export type SessionResolution =
    | { authenticated: true; claims: Claims }
    | { authenticated: false; reason: 'NO_SESSION' | TokenFailureCode | 'IDENTITY_NOT_FOUND' };

export interface SessionAuthorityDeps {
    repository: IdentityRepository;
    verifier: CredentialVerifier;
    secret: string;
    reissueSource?: ReissueSource;
    clock?: Clock;
}

const INVALID_CREDENTIALS = { success: false, reason: 'INVALID_CREDENTIALS' } as const;

export class SessionAuthority {
    private readonly repository: IdentityRepository;
    private readonly verifier: CredentialVerifier;
    private readonly secret: string;
    private readonly reissueSource: ReissueSource;
    private readonly clock: Clock;

    constructor(deps: SessionAuthorityDeps) {
        if (deps.secret.length === 0) {
            throw new Error('SessionAuthority requires a non-empty signing secret');
        }
        this.repository = deps.repository;
        this.verifier = deps.verifier;
        this.secret = deps.secret;
        this.reissueSource = deps.reissueSource ?? 'repository';
        this.clock = deps.clock ?? systemClock;
    }

    async login(credentials: LoginCredentials, session: SessionStore): Promise<LoginResult> {
        const identity = await this.lookup(() =>
            this.repository.findIdentityByEmailAndHub(credentials.email, credentials.hubId),
            'SessionAuthority:Login'
        );

        const verified = identity !== null
            && await this.verifier.verify(credentials.password, identity.passwordHash);

        if (identity === null || !verified) {
            logger.warn({ hubId: credentials.hubId, reason: 'INVALID_CREDENTIALS' }, 'Login rejected');
            return INVALID_CREDENTIALS;
        }

        const claims = buildClaims(identity, SESSION_TOKEN_TTL_SECONDS, this.clock());
        const token = await encodeToken(claims, this.secret);
        await session.store(token);

        logger.info({ subjectId: claims.sub, hubId: claims.hubId }, 'Login succeeded');
        return { success: true, token, claims };
    }

    /**
     * Exchange a valid token (typically a recovery token) for a fresh
     * session token bound to the given session.
     */
    async reissueFromToken(token: string, session: SessionStore): Promise<LoginResult> {
        const now = this.clock();
        const decoded = await decodeToken(token, this.secret, now);
        if (!decoded.ok) {
            logger.warn({ reason: decoded.reason }, 'Token re-issuance rejected');
            return INVALID_CREDENTIALS;
        }

        let claims: Claims;
        if (this.reissueSource === 'claims') {
            claims = renewClaims(decoded.claims, SESSION_TOKEN_TTL_SECONDS, now);
        } else {
            const identity = await this.findCurrentIdentity(decoded.claims, 'SessionAuthority:Reissue');
            if (identity === null) {
                logger.warn({ subjectId: decoded.claims.sub, hubId: decoded.claims.hubId }, 'Token subject no longer exists');
                return INVALID_CREDENTIALS;
            }
            claims = buildClaims(identity, SESSION_TOKEN_TTL_SECONDS, now);
        }

        const fresh = await encodeToken(claims, this.secret);
        await session.store(fresh);

        logger.info({ subjectId: claims.sub, hubId: claims.hubId, source: this.reissueSource }, 'Session token re-issued');
        return { success: true, token: fresh, claims };
    }

    /**
     * Resolve the caller of a session: stored token, valid signature and
     * expiry, identity still present in the token's hub.
     */
    async resolveSession(session: SessionStore): Promise<SessionResolution> {
        const token = await session.load();
        if (token === null) {
            return { authenticated: false, reason: 'NO_SESSION' };
        }

        const decoded = await decodeToken(token, this.secret, this.clock());
        if (!decoded.ok) {
            return { authenticated: false, reason: decoded.reason };
        }

        const identity = await this.findCurrentIdentity(decoded.claims, 'SessionAuthority:ResolveSession');
        if (identity === null) {
            logger.warn({ subjectId: decoded.claims.sub, hubId: decoded.claims.hubId }, 'Session subject no longer exists');
            return { authenticated: false, reason: 'IDENTITY_NOT_FOUND' };
        }

        return { authenticated: true, claims: decoded.claims };
    }

    async logout(session: SessionStore): Promise<void> {
        await session.clear();
    }

    private async findCurrentIdentity(claims: Claims, contextLabel: string): Promise<Identity | null> {
        const id = subjectId(claims);
        if (id === null) {
            return null;
        }
        const identity = await this.lookup(() => this.repository.findIdentityById(id), contextLabel);
        if (identity === null || identity.hubId !== claims.hubId) {
            return null;
        }
        return identity;
    }

    private async lookup<T>(query: () => Promise<T>, contextLabel: string): Promise<T> {
        try {
            return await query();
        } catch (error: unknown) {
            throw ErrorSanitizer.sanitize(error, contextLabel);
        }
    }
}

