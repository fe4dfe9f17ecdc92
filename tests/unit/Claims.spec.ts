/**
 * Unit Tests: Claims Builder
 *
 * @see libs/auth/claims.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    buildClaims,
    epochSeconds,
    hasRole,
    renewClaims,
    RECOVERY_TOKEN_TTL_SECONDS,
    SESSION_TOKEN_TTL_SECONDS,
    subjectId
} from '../../libs/auth/claims.js';
import { claims, identity, T0, T0_SECONDS } from './fixtures.js';

describe('Claims Builder', () => {
    it('should define session and recovery lifetimes', () => {
        assert.strictEqual(SESSION_TOKEN_TTL_SECONDS, 604800);
        assert.strictEqual(RECOVERY_TOKEN_TTL_SECONDS, 86400);
    });

    it('should floor milliseconds to epoch seconds', () => {
        assert.strictEqual(epochSeconds(new Date(1_700_000_000_999)), 1_700_000_000);
    });

    it('should derive canonical claims from an identity', () => {
        const built = buildClaims(
            identity({ email: 'Admin@Hub.TEST', name: null, roles: ['editor', 'admin'] }),
            SESSION_TOKEN_TTL_SECONDS,
            new Date(T0.getTime() + 500)
        );

        assert.deepStrictEqual(built, {
            sub: '7',
            email: 'admin@hub.test',
            hubId: 1,
            name: '',
            roles: ['editor', 'admin'],
            exp: T0_SECONDS + 604800
        });
    });

    it('should freeze the result and copy the roles', () => {
        const roles = ['admin'];
        const built = buildClaims(identity({ roles }), RECOVERY_TOKEN_TTL_SECONDS, T0);
        roles.push('editor');

        assert.ok(Object.isFrozen(built));
        assert.ok(Object.isFrozen(built.roles));
        assert.deepStrictEqual(built.roles, ['admin']);
    });

    it('should be idempotent on email normalization', () => {
        const once = buildClaims(identity({ email: 'MiXed@Hub.Test' }), 60, T0);
        const twice = buildClaims(identity({ email: once.email }), 60, T0);
        assert.strictEqual(twice.email, once.email);
    });

    it('should recompute expiry on renewal', () => {
        const renewed = renewClaims(claims({ exp: T0_SECONDS + 10 }), SESSION_TOKEN_TTL_SECONDS, T0);
        assert.strictEqual(renewed.exp, T0_SECONDS + 604800);
        assert.strictEqual(renewed.sub, '7');
    });

    it('should match roles exactly', () => {
        assert.strictEqual(hasRole(claims({ roles: ['admin'] }), 'admin'), true);
        assert.strictEqual(hasRole(claims({ roles: ['Admin'] }), 'admin'), false);
    });

    it('should parse positive integer subjects only', () => {
        assert.strictEqual(subjectId(claims({ sub: '7' })), 7);
        assert.strictEqual(subjectId(claims({ sub: '07' })), null);
        assert.strictEqual(subjectId(claims({ sub: '0' })), null);
        assert.strictEqual(subjectId(claims({ sub: '-1' })), null);
        assert.strictEqual(subjectId(claims({ sub: 'seven' })), null);
        assert.strictEqual(subjectId(claims({ sub: '99999999999999999999' })), null);
    });
});
