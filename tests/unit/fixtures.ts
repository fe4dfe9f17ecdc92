/**
 * Shared in-process stand-ins for unit tests.
 */

import { Claims, Identity } from '../../libs/context/identity.js';
import { IdentityRepository } from '../../libs/identity/repository.js';
import { NotificationSink, RecoveryMessage } from '../../libs/notification/types.js';
import { Queryable } from '../../libs/db/index.js';
import { Clock } from '../../libs/auth/claims.js';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'test-password';

/** 2023-11-14T22:13:20.000Z */
export const T0 = new Date(1_700_000_000_000);
export const T0_SECONDS = 1_700_000_000;

export class InMemoryIdentityRepository implements IdentityRepository {
    private readonly identities = new Map<number, Identity>();
    public lookups = 0;

    constructor(identities: Identity[] = []) {
        identities.forEach(identity => this.put(identity));
    }

    put(identity: Identity): void {
        this.identities.set(identity.id, identity);
    }

    remove(id: number): void {
        this.identities.delete(id);
    }

    async findIdentityByEmailAndHub(email: string, hubId: number): Promise<Identity | null> {
        this.lookups++;
        const wanted = email.trim().toLowerCase();
        for (const identity of this.identities.values()) {
            if (identity.hubId === hubId && identity.email.toLowerCase() === wanted) {
                return identity;
            }
        }
        return null;
    }

    async findIdentityById(id: number): Promise<Identity | null> {
        this.lookups++;
        return this.identities.get(id) ?? null;
    }
}

export class FailingIdentityRepository implements IdentityRepository {
    async findIdentityByEmailAndHub(): Promise<Identity | null> {
        throw new Error('connection terminated');
    }

    async findIdentityById(): Promise<Identity | null> {
        throw new Error('connection terminated');
    }
}

export class RecordingSink implements NotificationSink {
    public readonly messages: RecoveryMessage[] = [];

    constructor(private readonly failWith?: string) { }

    async publish(message: RecoveryMessage): Promise<void> {
        if (this.failWith !== undefined) {
            throw new Error(this.failWith);
        }
        this.messages.push(message);
    }
}

export interface RecordedQuery {
    text: string;
    params: unknown[] | undefined;
}

/**
 * Queryable stand-in: records every call and answers with canned rows.
 */
export function fakeQueryable(answer: (text: string, params?: unknown[]) => unknown[] | Error): {
    db: Queryable;
    calls: RecordedQuery[];
} {
    const calls: RecordedQuery[] = [];
    const db: Queryable = {
        query: async (text: string, params?: unknown[]) => {
            calls.push({ text, params });
            const rows = answer(text, params);
            if (rows instanceof Error) {
                throw rows;
            }
            return { rows };
        }
    };
    return { db, calls };
}

export function mutableClock(start: Date = T0): { clock: Clock; advance(seconds: number): void } {
    let current = start;
    return {
        clock: () => current,
        advance(seconds: number) {
            current = new Date(current.getTime() + seconds * 1000);
        }
    };
}

export function identity(overrides: Partial<Identity> = {}): Identity {
    return {
        id: 7,
        email: 'admin@hub.test',
        hubId: 1,
        name: 'Ada',
        passwordHash: '',
        roles: ['admin'],
        ...overrides
    };
}

export function claims(overrides: Partial<Claims> = {}): Claims {
    return {
        sub: '7',
        email: 'admin@hub.test',
        hubId: 1,
        name: 'Ada',
        roles: ['admin'],
        exp: T0_SECONDS + 3600,
        ...overrides
    };
}
