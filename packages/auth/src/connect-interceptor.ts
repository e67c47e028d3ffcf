/**
 * ConnectRPC adapter
 *
 * Runs the guard for every call and exposes the identity to handlers
 * through identityStorage.
 *
 * @module connect-interceptor
 */

import type { Interceptor, StreamRequest, UnaryRequest } from "@connectrpc/connect";
import { Code, ConnectError } from "@connectrpc/connect";
import { identityStorage } from "./context.ts";
import type { Guard } from "./guard.ts";
import { DENY_MESSAGES } from "./guard.ts";
import { DenyReason } from "./types.ts";

/**
 * Connect code reported for each deny reason.
 */
export const DENY_CODES: Readonly<Record<DenyReason, Code>> = {
    [DenyReason.MISSING_TOKEN]: Code.Unauthenticated,
    [DenyReason.INVALID_TOKEN]: Code.Unauthenticated,
    [DenyReason.EXPIRED_TOKEN]: Code.Unauthenticated,
    [DenyReason.UNAUTHORIZED]: Code.PermissionDenied,
    [DenyReason.KEY_FETCH_ERROR]: Code.Unavailable,
};

export interface AlbAuthInterceptorOptions {
    readonly guard: Guard;
    /**
     * Methods that bypass the guard: `"Service/Method"`, `"Service/*"` or `"*"`.
     * Service names are fully qualified, e.g. `"grpc.health.v1.Health/*"`.
     */
    readonly skipMethods?: ReadonlyArray<string> | undefined;
}

function isSkipped(req: UnaryRequest | StreamRequest, patterns: ReadonlyArray<string>): boolean {
    const service = req.service.typeName;
    return patterns.some((pattern) => pattern === "*" || pattern === `${service}/${req.method.name}` || pattern === `${service}/*`);
}

/**
 * Create the ConnectRPC interceptor.
 *
 * @example
 * ```typescript
 * const guard = createGuard(await guardConfigFromEnv());
 *
 * const handler = connectNodeAdapter({
 *   routes,
 *   interceptors: [createAlbAuthInterceptor({ guard, skipMethods: ["grpc.health.v1.Health/*"] })],
 * });
 * ```
 */
export function createAlbAuthInterceptor(options: AlbAuthInterceptorOptions): Interceptor {
    const { guard, skipMethods = [] } = options;

    return (next) => async (req: UnaryRequest | StreamRequest) => {
        if (isSkipped(req, skipMethods)) {
            return await next(req);
        }

        const decision = await guard.authenticate(req.header);
        if (decision.type === "deny") {
            throw new ConnectError(DENY_MESSAGES[decision.reason], DENY_CODES[decision.reason]);
        }

        return await identityStorage.run(decision.identity, () => next(req));
    };
}
