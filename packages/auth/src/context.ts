/**
 * Identity context storage
 *
 * Uses AsyncLocalStorage to make the verified identity available to handlers
 * without passing it through function parameters.
 *
 * @module context
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { MissingTokenError } from "./errors.ts";
import type { IdentityContext } from "./identity.ts";

/**
 * Module-level AsyncLocalStorage for the request identity.
 *
 * Set by the adapters, read by handlers via getIdentity().
 * Automatically isolated per async context (request).
 */
export const identityStorage = new AsyncLocalStorage<IdentityContext>();

/**
 * Get the identity of the current request.
 *
 * Returns undefined outside an adapter, or for a skipped method.
 *
 * @example Usage in a service handler
 * ```typescript
 * import { getIdentity } from "@albgate/auth";
 *
 * const handler = {
 *   async getProfile() {
 *     const identity = getIdentity();
 *     return { email: identity?.email ?? "" };
 *   },
 * };
 * ```
 */
export function getIdentity(): IdentityContext | undefined {
    return identityStorage.getStore();
}

/**
 * Get the identity of the current request or throw.
 *
 * @throws MissingTokenError if no identity is available
 */
export function requireIdentity(): IdentityContext {
    const identity = identityStorage.getStore();
    if (!identity) {
        throw new MissingTokenError("Authentication required");
    }
    return identity;
}
