import { RequestContext } from "../context/requestContext.js";
import { Claims } from "../context/identity.js";
import { AccessPolicy } from "./policies.js";
import { authorize } from "./authorize.js";
import { AuthError } from "./AuthError.js";
import { getContextLogger } from "../logging/logger.js";

/**
 * Reusable Authorization Guard
 * Reads the claims in scope and throws AuthError on denial.
 */
export function requirePolicy(policy: AccessPolicy): Claims {
    const claims = RequestContext.get();

    const decision = authorize(claims, policy);
    if (!decision.allowed) {
        throw new AuthError(decision.reason, `Forbidden: ${decision.reason}`);
    }

    getContextLogger(claims).info({
        requiredRole: policy.requiredRole,
        decision: 'ALLOW'
    }, "Authorization Successful");

    return claims;
}
