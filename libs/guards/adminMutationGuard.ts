/**
 * Admin Mutation Guard
 *
 * Pipeline for admin-sensitive mutations:
 * 1. Operation policy (role + hub scope)
 * 2. Self-protection, for every delete operation
 * 3. Live re-check of the caller against the repository, when requested
 *
 * Step 3 closes the window between token issue and use: a caller deleted
 * or stripped of the role since login is refused even with a valid token.
 *
 * A delete operation must carry the action of the same kind, naming its
 * target. A missing or mismatched action throws, as a missing resource hub
 * does in policyFor.
 */

import { logger } from '../logging/logger.js';
import { Claims, Identity } from '../context/identity.js';
import { authorize } from '../auth/authorize.js';
import { Operation, policyFor } from '../auth/policies.js';
import { subjectId } from '../auth/claims.js';
import { IdentityRepository } from '../identity/repository.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { DestructiveAction, executeSelfProtectionGuard, isDestructiveOperation } from './selfProtectionGuard.js';

export interface AdminMutationGuardOptions {
    /** Required for hub-scoped operations */
    readonly resourceHubId?: number;
    /** Required for delete operations, with the same kind as the operation */
    readonly action?: DestructiveAction;
    readonly recheck?: { readonly repository: IdentityRepository };
}

export type AdminMutationDenyReason =
    | 'MISSING_ROLE'
    | 'WRONG_HUB'
    | 'SELF_ACTION_FORBIDDEN'
    | 'IDENTITY_NOT_FOUND';

export type AdminMutationGuardResult =
    | { allowed: true }
    | { allowed: false; reason: AdminMutationDenyReason };

function destructiveTarget(operation: Operation, action: DestructiveAction | undefined): DestructiveAction | null {
    if (!isDestructiveOperation(operation)) {
        if (action !== undefined) {
            throw new Error(`Operation ${operation} does not take a ${action.kind} action`);
        }
        return null;
    }
    if (action === undefined || action.kind !== operation) {
        throw new Error(`Operation ${operation} requires a matching ${operation} action`);
    }
    return action;
}

export async function guardAdminMutation(
    claims: Claims,
    operation: Operation,
    options: AdminMutationGuardOptions = {}
): Promise<AdminMutationGuardResult> {
    const target = destructiveTarget(operation, options.action);
    const policy = policyFor(operation, options.resourceHubId);

    const decision = authorize(claims, policy);
    if (!decision.allowed) {
        return decision;
    }

    if (target !== null) {
        const protection = executeSelfProtectionGuard(claims, target);
        if (!protection.allowed) {
            return protection;
        }
    }

    if (options.recheck) {
        const id = subjectId(claims);
        let current: Identity | null;
        try {
            current = id === null ? null : await options.recheck.repository.findIdentityById(id);
        } catch (error: unknown) {
            throw ErrorSanitizer.sanitize(error, 'AdminMutationGuard:Recheck');
        }

        if (current === null || current.hubId !== claims.hubId) {
            logger.warn({ subjectId: claims.sub, operation, reason: 'IDENTITY_NOT_FOUND' }, 'Admin mutation guard denied request');
            return { allowed: false, reason: 'IDENTITY_NOT_FOUND' };
        }

        if (policy.requiredRole !== null && !current.roles.includes(policy.requiredRole)) {
            logger.warn({ subjectId: claims.sub, operation, reason: 'MISSING_ROLE' }, 'Admin mutation guard denied request');
            return { allowed: false, reason: 'MISSING_ROLE' };
        }
    }

    logger.debug({ subjectId: claims.sub, operation }, 'Admin mutation guard passed');
    return { allowed: true };
}
