import pino from "pino";
import { Claims } from "../context/identity.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

/**
 * Process-wide logger. Level from LOG_LEVEL; secrets, hashes and tokens
 * are censored by path before serialization.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "hubgate",
    pid: process.pid
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Child logger bound to the verified caller. Never carries the email.
 */
export function getContextLogger(claims: Claims) {
  return logger.child({
    subjectId: claims.sub,
    hubId: claims.hubId
  });
}
