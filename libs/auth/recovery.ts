/**
 * Recovery Orchestrator
 *
 * Issues a one-day token for a single identity and hands a recovery
 * link to the notification sink. Issued tokens are not stored; a recovery
 * token stays valid until it expires.
 */

import { Identity } from '../context/identity.js';
import { IdentityRepository } from '../identity/repository.js';
import { NotificationSink, RecoveryMessage } from '../notification/types.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { logger } from '../logging/logger.js';
import { buildClaims, Clock, RECOVERY_TOKEN_TTL_SECONDS, systemClock } from './claims.js';
import { encodeToken } from './tokenCodec.js';

export const RECOVERY_SUBJECT = 'Password recovery';

export interface RecoveryRequest {
    readonly email: string;
    readonly hubId: number;
}

export type RecoveryResult =
    | { issued: true; token: string; recoveryUrl: string; delivered: boolean; deliveryError?: string }
    | { issued: false; reason: 'IDENTITY_NOT_FOUND' };

export interface RecoveryOrchestratorDeps {
    repository: IdentityRepository;
    sink: NotificationSink;
    secret: string;
    baseUrl: string;
    clock?: Clock;
}

export function buildRecoveryUrl(baseUrl: string, token: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/auth/login?token=${encodeURIComponent(token)}`;
}

export class RecoveryOrchestrator {
    private readonly clock: Clock;

    constructor(private readonly deps: RecoveryOrchestratorDeps) {
        this.clock = deps.clock ?? systemClock;
    }

    async requestRecovery(request: RecoveryRequest): Promise<RecoveryResult> {
        let identity: Identity | null;
        try {
            identity = await this.deps.repository.findIdentityByEmailAndHub(request.email, request.hubId);
        } catch (error: unknown) {
            throw ErrorSanitizer.sanitize(error, 'RecoveryOrchestrator:Lookup');
        }

        if (identity === null) {
            logger.warn({ hubId: request.hubId, reason: 'IDENTITY_NOT_FOUND' }, 'Recovery requested for unknown identity');
            return { issued: false, reason: 'IDENTITY_NOT_FOUND' };
        }

        const claims = buildClaims(identity, RECOVERY_TOKEN_TTL_SECONDS, this.clock());
        const token = await encodeToken(claims, this.deps.secret);
        const recoveryUrl = buildRecoveryUrl(this.deps.baseUrl, token);

        const message: RecoveryMessage = {
            hubId: identity.hubId,
            recipient: { address: claims.email, name: claims.name },
            subject: RECOVERY_SUBJECT,
            body: `Follow this link to sign in and reset your password: ${recoveryUrl}`,
            fields: { recovery_url: recoveryUrl }
        };

        try {
            await this.deps.sink.publish(message);
        } catch (error: unknown) {
            const deliveryError = error instanceof Error ? error.message : String(error);
            logger.error({ subjectId: claims.sub, hubId: claims.hubId, deliveryError }, 'Recovery notification could not be published');
            return { issued: true, token, recoveryUrl, delivered: false, deliveryError };
        }

        logger.info({ subjectId: claims.sub, hubId: claims.hubId }, 'Recovery token issued');
        return { issued: true, token, recoveryUrl, delivered: true };
    }
}
