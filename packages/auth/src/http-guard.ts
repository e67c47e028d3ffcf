/**
 * Node HTTP adapter
 *
 * Connect-style `(req, res, next)` middleware for node:http, node:http2 and
 * express-compatible servers.
 *
 * @module http-guard
 */

import { identityStorage } from "./context.ts";
import type { Guard } from "./guard.ts";
import { DENY_MESSAGES } from "./guard.ts";
import type { HeaderSource } from "./types.ts";
import { DenyReason } from "./types.ts";

/**
 * HTTP status codes mapped from deny reasons
 */
const REASON_TO_HTTP = new Map<DenyReason, number>([
    [DenyReason.MISSING_TOKEN, 401],
    [DenyReason.INVALID_TOKEN, 401],
    [DenyReason.EXPIRED_TOKEN, 401],
    [DenyReason.UNAUTHORIZED, 403],
    [DenyReason.KEY_FETCH_ERROR, 503],
]);

/**
 * How denied requests are answered.
 */
export const DenyResponse = {
    /** 401 / 403 / 503 with a plain-text body */
    STATUS: "status",
    /** 302 to the guard's denyTarget; falls back to STATUS without one */
    REDIRECT: "redirect",
} as const;

export type DenyResponse = (typeof DenyResponse)[keyof typeof DenyResponse];

export interface HttpGuardOptions {
    /** @default "status" */
    readonly respond?: DenyResponse | undefined;
}

/**
 * Structural request shape; node:http and node:http2 requests both satisfy it
 */
export interface HttpGuardRequest {
    readonly headers: Exclude<HeaderSource, Headers>;
}

export interface HttpGuardResponse {
    statusCode: number;
    setHeader(name: string, value: string): unknown;
    end(body?: string): unknown;
}

export type HttpGuardMiddleware = (req: HttpGuardRequest, res: HttpGuardResponse, next: () => void) => Promise<void>;

/**
 * Status code for a deny reason
 */
export function httpStatusFor(reason: DenyReason): number {
    return REASON_TO_HTTP.get(reason) ?? 401;
}

/**
 * Create the middleware.
 *
 * On allow, `next()` runs inside identityStorage so handlers can call getIdentity().
 *
 * @example
 * ```typescript
 * const protect = createHttpGuard(guard, { respond: "redirect" });
 *
 * http.createServer((req, res) => {
 *   void protect(req, res, () => res.end(`hello ${requireIdentity().email}`));
 * });
 * ```
 */
export function createHttpGuard(guard: Guard, options: HttpGuardOptions = {}): HttpGuardMiddleware {
    const respond = options.respond ?? DenyResponse.STATUS;

    return async function httpGuard(req, res, next) {
        const decision = await guard.authenticate(req.headers);

        if (decision.type === "allow") {
            identityStorage.run(decision.identity, next);
            return;
        }

        if (respond === DenyResponse.REDIRECT && guard.denyTarget) {
            res.statusCode = 302;
            res.setHeader("Location", guard.denyTarget);
            res.end();
            return;
        }

        res.statusCode = httpStatusFor(decision.reason);
        res.setHeader("Content-Type", "text/plain; charset=utf-8");
        res.end(DENY_MESSAGES[decision.reason]);
    };
}
