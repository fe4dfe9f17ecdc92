// Model
export * from './context/identity.js';
export * from './context/requestContext.js';
export * from './context/sessionStore.js';

// Auth
export * from './auth/AuthError.js';
export * from './auth/claims.js';
export * from './auth/credentialVerifier.js';
export * from './auth/tokenCodec.js';
export * from './auth/sessionAuthority.js';
export * from './auth/policies.js';
export * from './auth/authorize.js';
export * from './auth/requirePolicy.js';
export * from './auth/recovery.js';
export * from './auth/redirects.js';

// Guards
export * from './guards/index.js';

// Persistence and delivery
export * from './db/index.js';
export * from './identity/repository.js';
export * from './notification/types.js';
export * from './notification/outboxSink.js';

// Ambient
export * from './errors/sanitizer.js';
export * from './logging/logger.js';
export * from './validation/schema.js';
export * from './validation/claimsSchema.js';
export * from './validation/zod-middleware.js';
export * from './bootstrap/config-guard.js';
export * from './bootstrap/config/auth-config.js';
export * from './bootstrap/config/db-config.js';
export * from './bootstrap/startup.js';
