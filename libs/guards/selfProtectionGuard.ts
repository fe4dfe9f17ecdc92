/**
 * Self-protection Guard
 *
 * Purpose: stop an admin from removing the ground they stand on.
 *
 * Rules:
 * - A caller may never delete its own account
 * - A caller may never delete the hub it belongs to
 * - The reserved admin role (id 1) may never be deleted
 */

import { logger } from '../logging/logger.js';
import { Claims, PROTECTED_ROLE_ID } from '../context/identity.js';
import { subjectId } from '../auth/claims.js';

export type DestructiveAction =
    | { readonly kind: 'user:delete'; readonly userId: number }
    | { readonly kind: 'hub:delete'; readonly hubId: number }
    | { readonly kind: 'role:delete'; readonly roleId: number };

export type DestructiveOperation = DestructiveAction['kind'];

const DESTRUCTIVE_OPERATIONS: ReadonlySet<string> = new Set<DestructiveOperation>(['user:delete', 'hub:delete', 'role:delete']);

export function isDestructiveOperation(operation: string): operation is DestructiveOperation {
    return DESTRUCTIVE_OPERATIONS.has(operation);
}

export type SelfProtectionDenyReason = 'SELF_ACTION_FORBIDDEN';

export type SelfProtectionResult =
    | { allowed: true }
    | { allowed: false; reason: SelfProtectionDenyReason };

export function executeSelfProtectionGuard(claims: Claims, action: DestructiveAction): SelfProtectionResult {
    let violation: string | null = null;

    switch (action.kind) {
        case 'user:delete':
            if (subjectId(claims) === action.userId) violation = 'own account';
            break;
        case 'hub:delete':
            if (claims.hubId === action.hubId) violation = 'own hub';
            break;
        case 'role:delete':
            if (action.roleId === PROTECTED_ROLE_ID) violation = 'protected role';
            break;
    }

    if (violation !== null) {
        logger.warn({
            subjectId: claims.sub,
            hubId: claims.hubId,
            action: action.kind,
            violation,
            reason: 'SELF_ACTION_FORBIDDEN'
        }, 'Self-protection guard denied request');
        return { allowed: false, reason: 'SELF_ACTION_FORBIDDEN' };
    }

    logger.debug({ subjectId: claims.sub, action: action.kind }, 'Self-protection guard passed');
    return { allowed: true };
}
