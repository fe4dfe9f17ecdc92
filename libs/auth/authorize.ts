import { ADMIN_ROLE, Claims } from "../context/identity.js";
import { AccessPolicy } from "./policies.js";
import { hasRole } from "./claims.js";
import { logger } from "../logging/logger.js";

export type AuthorizationDenyReason = 'MISSING_ROLE' | 'WRONG_HUB';

export type AuthorizationResult =
    | { allowed: true }
    | { allowed: false; reason: AuthorizationDenyReason };

/**
 * Authorization Engine
 * Evaluates one policy against verified claims. Pure apart from logging;
 * neither the claims nor the policy are touched.
 *
 * Rule order:
 * 1. Required role (exact, case-sensitive, no hierarchy)
 * 2. Own-hub scope: resource hub must equal the caller's hub
 * 3. Explicit hub scope: caller's hub, or any hub for admins
 */
export function authorize(claims: Claims, policy: AccessPolicy): AuthorizationResult {
    const { requiredRole, hubScope } = policy;

    if (requiredRole !== null && !hasRole(claims, requiredRole)) {
        return deny(claims, policy, 'MISSING_ROLE');
    }

    switch (hubScope.mode) {
        case 'any':
            break;
        case 'own':
            if (hubScope.resourceHubId !== claims.hubId) {
                return deny(claims, policy, 'WRONG_HUB');
            }
            break;
        case 'hub':
            if (hubScope.hubId !== claims.hubId && !hasRole(claims, ADMIN_ROLE)) {
                return deny(claims, policy, 'WRONG_HUB');
            }
            break;
    }

    logger.debug({
        subjectId: claims.sub,
        hubId: claims.hubId,
        requiredRole,
        scope: hubScope.mode,
        decision: 'ALLOW'
    }, "Authorization granted");

    return { allowed: true };
}

function deny(claims: Claims, policy: AccessPolicy, reason: AuthorizationDenyReason): AuthorizationResult {
    logger.warn({
        subjectId: claims.sub,
        hubId: claims.hubId,
        requiredRole: policy.requiredRole,
        scope: policy.hubScope.mode,
        decision: 'DENY',
        reason
    }, "Authorization denied");
    return { allowed: false, reason };
}
