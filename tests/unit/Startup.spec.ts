/**
 * Unit Tests: Authority composition
 *
 * @see libs/bootstrap/startup.ts
 */

import { describe, it, before } from 'node:test';
import assert from 'node:assert';
import { createAuthority } from '../../libs/bootstrap/startup.js';
import { AuthConfig } from '../../libs/bootstrap/config/auth-config.js';
import { CredentialVerifier } from '../../libs/auth/credentialVerifier.js';
import { MemorySessionStore } from '../../libs/context/sessionStore.js';
import { identity, InMemoryIdentityRepository, RecordingSink, T0, TEST_PASSWORD, TEST_SECRET } from './fixtures.js';

const CONFIG: AuthConfig = {
    secret: TEST_SECRET,
    domain: 'hub.test',
    baseUrl: 'https://auth.hub.test',
    reissueSource: 'repository'
};

describe('createAuthority', () => {
    const verifier = new CredentialVerifier(4);
    let repository: InMemoryIdentityRepository;

    before(async () => {
        repository = new InMemoryIdentityRepository([identity({ passwordHash: await verifier.hash(TEST_PASSWORD) })]);
    });

    it('should validate and normalize login input at the boundary', async () => {
        const authority = createAuthority(CONFIG, { repository, sink: new RecordingSink(), verifier, clock: () => T0 });
        const session = new MemorySessionStore();

        const result = await authority.login({ email: ' Admin@Hub.Test ', password: TEST_PASSWORD, hubId: '1' }, session);

        assert.ok(result.success);
        assert.strictEqual(result.claims.email, 'admin@hub.test');
        assert.strictEqual(await session.load(), result.token);
    });

    it('should reject malformed input before it reaches the core', async () => {
        const authority = createAuthority(CONFIG, { repository, sink: new RecordingSink(), verifier });
        const lookupsBefore = repository.lookups;

        await assert.rejects(
            () => authority.login({ email: 'not-an-email', password: '', hubId: 0 }, new MemorySessionStore()),
            /Validation Violation in Authority:Login/
        );
        assert.strictEqual(repository.lookups, lookupsBefore);
    });

    it('should wire recovery and reissue through the same secret', async () => {
        const sink = new RecordingSink();
        const authority = createAuthority(CONFIG, { repository, sink, verifier, clock: () => T0 });

        const recovery = await authority.requestRecovery({ email: 'admin@hub.test', hubId: 1 });
        assert.ok(recovery.issued);
        assert.ok(recovery.recoveryUrl.startsWith('https://auth.hub.test/auth/login?token='));

        const session = new MemorySessionStore();
        const reissued = await authority.reissue({ token: recovery.token }, session);
        assert.ok(reissued.success);
        assert.strictEqual(sink.messages.length, 1);
    });

    it('should bind redirects to the configured domain', () => {
        const authority = createAuthority(CONFIG, { repository, sink: new RecordingSink(), verifier });

        assert.deepStrictEqual(authority.redirects('/auth/signin', 'https://app.hub.test/'), {
            success: 'https://app.hub.test/',
            failure: '/auth/signin?next=https%3A%2F%2Fapp.hub.test%2F'
        });
        assert.deepStrictEqual(authority.redirects('/auth/signin', 'https://other.test/'), {
            success: '/',
            failure: '/auth/signin'
        });
    });
});
