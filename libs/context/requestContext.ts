import { AsyncLocalStorage } from 'node:async_hooks';
import { Claims } from "./identity.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the request boundary should call run() with claims it has verified.
 * All downstream code should only call get() or find().
 */

const storage = new AsyncLocalStorage<Claims>();

export class RequestContext {
    /**
     * Establish the verified claim scope for a request lifecycle.
     * Supports both sync and async functions.
     */
    public static run<T>(
        claims: Claims,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze(claims), fn);
    }

    /**
     * Get the current claims.
     * Fails closed: throws if called outside a run() scope.
     */
    public static get(): Claims {
        const claims = storage.getStore();
        if (!claims) {
            throw new Error("MISSING_REQUEST_CONTEXT: No verified claims in scope");
        }
        return claims;
    }

    /** Claims in scope, or null for anonymous requests. */
    public static find(): Claims | null {
        return storage.getStore() ?? null;
    }
}
