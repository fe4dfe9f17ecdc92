/**
 * Hubgate Operation Policy Table
 *
 * Principles:
 * - Operations are verbs, policies are data
 * - Admin-sensitive operations require the reserved admin role
 * - Hub scoping is decided per operation, not per caller
 */

import { ADMIN_ROLE } from '../context/identity.js';

export type HubScope =
    | { readonly mode: 'any' }
    | { readonly mode: 'own'; readonly resourceHubId: number }
    | { readonly mode: 'hub'; readonly hubId: number };

export interface AccessPolicy {
    /** Role name the caller must hold, or null for any authenticated caller */
    readonly requiredRole: string | null;
    readonly hubScope: HubScope;
}

export type Operation =
    // Hub-local administration
    | 'user:read'
    | 'user:update'
    | 'user:delete'
    | 'menu:create'
    | 'menu:delete'

    // Global administration
    | 'role:create'
    | 'role:delete'
    | 'hub:create'
    | 'hub:delete'

    // Authenticated members
    | 'user:list'
    | 'profile:update';

type PolicyShape = { requiredRole: string | null; scoped: boolean };

const OPERATION_POLICY: Record<Operation, PolicyShape> = {
    'user:read': { requiredRole: ADMIN_ROLE, scoped: true },
    'user:update': { requiredRole: ADMIN_ROLE, scoped: true },
    'user:delete': { requiredRole: ADMIN_ROLE, scoped: true },
    'menu:create': { requiredRole: ADMIN_ROLE, scoped: true },
    'menu:delete': { requiredRole: ADMIN_ROLE, scoped: true },

    'role:create': { requiredRole: ADMIN_ROLE, scoped: false },
    'role:delete': { requiredRole: ADMIN_ROLE, scoped: false },
    'hub:create': { requiredRole: ADMIN_ROLE, scoped: false },
    'hub:delete': { requiredRole: ADMIN_ROLE, scoped: false },

    'user:list': { requiredRole: null, scoped: true },
    'profile:update': { requiredRole: null, scoped: false }
};

export const OPERATIONS: readonly Operation[] = Object.freeze(
    Object.keys(OPERATION_POLICY).filter(isOperation)
);

export function isOperation(value: string): value is Operation {
    return Object.prototype.hasOwnProperty.call(OPERATION_POLICY, value);
}

export function isHubScoped(operation: Operation): boolean {
    return OPERATION_POLICY[operation].scoped;
}

/**
 * Resolve the access policy for an operation.
 * Hub-scoped operations need the hub of the resource being touched.
 */
export function policyFor(operation: Operation, resourceHubId?: number): AccessPolicy {
    const shape = OPERATION_POLICY[operation];
    if (!shape.scoped) {
        return Object.freeze({ requiredRole: shape.requiredRole, hubScope: Object.freeze({ mode: 'any' as const }) });
    }
    if (resourceHubId === undefined) {
        throw new Error(`Operation ${operation} is hub-scoped and requires a resource hub id`);
    }
    return Object.freeze({
        requiredRole: shape.requiredRole,
        hubScope: Object.freeze({ mode: 'own' as const, resourceHubId })
    });
}
