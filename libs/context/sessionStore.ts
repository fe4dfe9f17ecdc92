/**
 * Session store contract. The authority binds the issued token here and
 * reads it back on later requests; transport (cookie, header) is the
 * caller's concern.
 */
export interface SessionStore {
    store(token: string): Promise<void>;
    load(): Promise<string | null>;
    clear(): Promise<void>;
}

/**
 * Single-session in-memory store. One instance per client session.
 */
export class MemorySessionStore implements SessionStore {
    private token: string | null = null;

    async store(token: string): Promise<void> {
        this.token = token;
    }

    async load(): Promise<string | null> {
        return this.token;
    }

    async clear(): Promise<void> {
        this.token = null;
    }
}
