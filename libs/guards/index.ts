/**
 * Hubgate Runtime Guards
 *
 * Guards are pre-flight filters returning typed results, never throwing
 * on a denial.
 *
 * Guard Pipeline:
 * 1. Authorization → role and hub scope (libs/auth/authorize.ts)
 * 2. Self-protection → destructive actions against the caller's own ground
 * 3. Admin mutation → 1 + 2 + live re-check of the caller
 */

// Self-protection Guard
export type {
    DestructiveAction,
    DestructiveOperation,
    SelfProtectionResult,
    SelfProtectionDenyReason
} from './selfProtectionGuard.js';
export { executeSelfProtectionGuard, isDestructiveOperation } from './selfProtectionGuard.js';

// Admin Mutation Guard
export type {
    AdminMutationGuardOptions,
    AdminMutationGuardResult,
    AdminMutationDenyReason
} from './adminMutationGuard.js';
export { guardAdminMutation } from './adminMutationGuard.js';
