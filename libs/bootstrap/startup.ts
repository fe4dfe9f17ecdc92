import pg from "pg";
import { logger } from "../logging/logger.js";
import { ConfigEnv, ConfigGuard } from "./config-guard.js";
import { AUTH_CONFIG_GUARDS, AuthConfig, loadAuthConfig } from "./config/auth-config.js";
import { DB_CONFIG_GUARDS, loadDbConfig } from "./config/db-config.js";
import { asQueryable, createPool } from "../db/index.js";
import { IdentityRepository, PgIdentityRepository } from "../identity/repository.js";
import { NotificationSink } from "../notification/types.js";
import { OutboxNotificationSink } from "../notification/outboxSink.js";
import { CredentialVerifier } from "../auth/credentialVerifier.js";
import { SessionAuthority } from "../auth/sessionAuthority.js";
import { RecoveryOrchestrator } from "../auth/recovery.js";
import { resolveRedirects, RedirectTargets } from "../auth/redirects.js";
import { Clock } from "../auth/claims.js";
import { LoginResult } from "../auth/sessionAuthority.js";
import { RecoveryResult } from "../auth/recovery.js";
import { SessionStore } from "../context/sessionStore.js";
import { validate } from "../validation/zod-middleware.js";
import { LoginInputSchema, RecoveryInputSchema, TokenInputSchema } from "../validation/schema.js";

export interface AuthorityDeps {
    repository: IdentityRepository;
    sink: NotificationSink;
    verifier?: CredentialVerifier;
    clock?: Clock;
}

export interface Authority {
    readonly config: AuthConfig;
    readonly sessions: SessionAuthority;
    readonly recovery: RecoveryOrchestrator;
    /** Redirect targets bound to the configured domain */
    redirects(failurePath: string, next: string | null | undefined): RedirectTargets;

    /** Boundary entry points: untrusted input is validated before it reaches the core. */
    login(input: unknown, session: SessionStore): Promise<LoginResult>;
    reissue(input: unknown, session: SessionStore): Promise<LoginResult>;
    requestRecovery(input: unknown): Promise<RecoveryResult>;
}

/**
 * Wire the authority components from validated config.
 */
export function createAuthority(config: AuthConfig, deps: AuthorityDeps): Authority {
    const verifier = deps.verifier ?? new CredentialVerifier();

    const sessions = new SessionAuthority({
        repository: deps.repository,
        verifier,
        secret: config.secret,
        reissueSource: config.reissueSource,
        clock: deps.clock
    });

    const recovery = new RecoveryOrchestrator({
        repository: deps.repository,
        sink: deps.sink,
        secret: config.secret,
        baseUrl: config.baseUrl,
        clock: deps.clock
    });

    return {
        config,
        sessions,
        recovery,
        redirects: (failurePath, next) => resolveRedirects(failurePath, next, config.domain),
        login: async (input, session) =>
            sessions.login(validate(LoginInputSchema, input, 'Authority:Login'), session),
        reissue: async (input, session) =>
            sessions.reissueFromToken(validate(TokenInputSchema, input, 'Authority:Reissue').token, session),
        requestRecovery: async input =>
            recovery.requestRecovery(validate(RecoveryInputSchema, input, 'Authority:Recovery'))
    };
}

export interface BootstrappedAuthority extends Authority {
    readonly pool: pg.Pool;
    shutdown(): Promise<void>;
}

/**
 * Process entry: enforce config guards (fatal on violation), then build the
 * pool, repository and outbox sink behind the authority.
 */
export async function bootstrap(env: ConfigEnv = process.env): Promise<BootstrappedAuthority> {
    logger.info("Bootstrapping hubgate");

    ConfigGuard.enforce([...AUTH_CONFIG_GUARDS, ...DB_CONFIG_GUARDS], env);

    const authConfig = loadAuthConfig(env);
    const pool = createPool(loadDbConfig(env));
    const db = asQueryable(pool);

    const authority = createAuthority(authConfig, {
        repository: new PgIdentityRepository(db),
        sink: new OutboxNotificationSink(db)
    });

    logger.info({ domain: authConfig.domain, reissueSource: authConfig.reissueSource }, "Startup checks passed");

    return {
        ...authority,
        pool,
        shutdown: async () => {
            await pool.end();
            logger.info("Hubgate pool closed");
        }
    };
}
