/**
 * Unit Tests: Authorization Engine
 *
 * Rule order: required role, own-hub scope, explicit hub scope.
 *
 * @see libs/auth/authorize.ts
 * @see libs/auth/policies.ts
 * @see libs/auth/requirePolicy.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { authorize } from '../../libs/auth/authorize.js';
import { AccessPolicy, isHubScoped, isOperation, OPERATIONS, policyFor } from '../../libs/auth/policies.js';
import { requirePolicy } from '../../libs/auth/requirePolicy.js';
import { AuthError } from '../../libs/auth/AuthError.js';
import { RequestContext } from '../../libs/context/requestContext.js';
import { claims } from './fixtures.js';

const admin = claims({ roles: ['admin'] });
const member = claims({ sub: '9', email: 'member@hub.test', roles: ['editor'] });

describe('Authorization Engine', () => {
    describe('Rule 1: Required role', () => {
        it('should deny every admin-only operation to a non-admin', () => {
            const adminOnly = OPERATIONS.filter(operation => policyFor(operation, 1).requiredRole === 'admin');

            assert.strictEqual(adminOnly.length, 9);
            for (const operation of adminOnly) {
                assert.deepStrictEqual(
                    authorize(member, policyFor(operation, 1)),
                    { allowed: false, reason: 'MISSING_ROLE' },
                    operation
                );
            }
        });

        it('should match role names case-sensitively', () => {
            const shouting = claims({ roles: ['ADMIN'] });
            assert.deepStrictEqual(authorize(shouting, policyFor('role:create')), { allowed: false, reason: 'MISSING_ROLE' });
        });

        it('should check the role before the hub', () => {
            assert.deepStrictEqual(authorize(member, policyFor('user:delete', 2)), { allowed: false, reason: 'MISSING_ROLE' });
        });

        it('should allow any authenticated caller when no role is required', () => {
            assert.deepStrictEqual(authorize(member, policyFor('profile:update')), { allowed: true });
        });
    });

    describe('Rule 2: Own-hub scope', () => {
        it('should allow an admin inside its own hub', () => {
            assert.deepStrictEqual(authorize(admin, policyFor('user:update', 1)), { allowed: true });
        });

        it('should deny an admin acting on another hub', () => {
            assert.deepStrictEqual(authorize(admin, policyFor('user:update', 2)), { allowed: false, reason: 'WRONG_HUB' });
        });

        it('should scope member listing to the caller hub', () => {
            assert.deepStrictEqual(authorize(member, policyFor('user:list', 1)), { allowed: true });
            assert.deepStrictEqual(authorize(member, policyFor('user:list', 3)), { allowed: false, reason: 'WRONG_HUB' });
        });
    });

    describe('Rule 3: Explicit hub scope', () => {
        const hubTwo: AccessPolicy = { requiredRole: null, hubScope: { mode: 'hub', hubId: 2 } };

        it('should deny a member of another hub', () => {
            assert.deepStrictEqual(authorize(member, hubTwo), { allowed: false, reason: 'WRONG_HUB' });
        });

        it('should allow a member of the hub', () => {
            assert.deepStrictEqual(authorize(claims({ hubId: 2, roles: [] }), hubTwo), { allowed: true });
        });

        it('should allow an admin across hubs', () => {
            assert.deepStrictEqual(authorize(admin, hubTwo), { allowed: true });
        });
    });

    it('should not mutate claims or policy', () => {
        const callerCopy = structuredClone(member);
        const policy = policyFor('user:delete', 1);
        const policyCopy = structuredClone(policy);

        authorize(member, policy);

        assert.deepStrictEqual(member, callerCopy);
        assert.deepStrictEqual(policy, policyCopy);
    });

    describe('Policy table', () => {
        it('should mark global admin operations as unscoped', () => {
            for (const operation of ['role:create', 'role:delete', 'hub:create', 'hub:delete'] as const) {
                assert.strictEqual(isHubScoped(operation), false, operation);
                assert.deepStrictEqual(policyFor(operation), { requiredRole: 'admin', hubScope: { mode: 'any' } });
            }
        });

        it('should require a resource hub for scoped operations', () => {
            assert.throws(() => policyFor('menu:create'), /requires a resource hub id/);
            assert.deepStrictEqual(policyFor('menu:create', 4), {
                requiredRole: 'admin',
                hubScope: { mode: 'own', resourceHubId: 4 }
            });
        });

        it('should recognise only known operations', () => {
            assert.strictEqual(isOperation('user:delete'), true);
            assert.strictEqual(isOperation('ledger:write'), false);
            assert.strictEqual(isOperation('toString'), false);
        });
    });

    describe('requirePolicy', () => {
        it('should fail closed outside a request scope', () => {
            assert.throws(() => requirePolicy(policyFor('profile:update')), /MISSING_REQUEST_CONTEXT/);
        });

        it('should throw a 403 AuthError on denial', () => {
            RequestContext.run(member, () => {
                assert.throws(
                    () => requirePolicy(policyFor('hub:create')),
                    (err: unknown) => {
                        assert.ok(err instanceof AuthError);
                        assert.strictEqual(err.code, 'MISSING_ROLE');
                        assert.strictEqual(err.statusCode, 403);
                        return true;
                    }
                );
            });
        });

        it('should return the claims in scope when allowed', () => {
            const result = RequestContext.run(admin, () => requirePolicy(policyFor('hub:create')));
            assert.deepStrictEqual(result, admin);
        });
    });
});
