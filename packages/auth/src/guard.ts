/**
 * Guard
 *
 * The boundary hosting adapters call: request headers in, allow/deny out.
 * Nothing thrown on the verification path escapes it.
 *
 * @module guard
 */

import type { Logger } from "@albgate/otel";
import { getLogger } from "@albgate/otel";
import { Authorizer } from "./authorizer.ts";
import { AlbAuthError, UnauthorizedError } from "./errors.ts";
import { extractTokenPair } from "./headers.ts";
import { IdentityContext } from "./identity.ts";
import { KeyCache } from "./key-cache.ts";
import type { ClaimsVerifier } from "./token-verifier.ts";
import { TokenVerifier } from "./token-verifier.ts";
import type { GuardConfig, HeaderSource } from "./types.ts";
import { DenyReason } from "./types.ts";

export interface AllowDecision {
    readonly type: "allow";
    readonly identity: IdentityContext;
}

export interface DenyDecision {
    readonly type: "deny";
    readonly reason: DenyReason;
    /** Server-side detail; not meant for end users */
    readonly message: string;
}

export type AuthDecision = AllowDecision | DenyDecision;

/**
 * Client-safe wording for each deny reason.
 */
export const DENY_MESSAGES: Readonly<Record<DenyReason, string>> = {
    [DenyReason.MISSING_TOKEN]: "Missing credentials",
    [DenyReason.INVALID_TOKEN]: "Authentication failed",
    [DenyReason.EXPIRED_TOKEN]: "Session expired",
    [DenyReason.KEY_FETCH_ERROR]: "Authentication temporarily unavailable",
    [DenyReason.UNAUTHORIZED]: "Access denied",
};

/**
 * Guard constructor options
 */
export interface GuardOptions {
    readonly verifier: ClaimsVerifier;
    /** @default new Authorizer() (authenticated-only) */
    readonly authorizer?: Authorizer | undefined;
    /** Opaque value handed to adapters, typically a redirect URL */
    readonly denyTarget?: string | undefined;
    /** @default getLogger("albgate.guard") */
    readonly logger?: Logger | undefined;
}

/**
 * Turns request headers into an authorization decision.
 *
 * One instance serves every request; it holds no per-request state.
 *
 * @example
 * ```typescript
 * const guard = createGuard({ region: "eu-west-2", rules: [domainRule(["example.com"])] });
 *
 * const decision = await guard.authenticate(req.headers);
 * if (decision.type === "deny") {
 *   return respond(decision.reason === "unauthorized" ? 403 : 401);
 * }
 * console.log(`hello ${decision.identity.email}`);
 * ```
 */
export class Guard {
    readonly denyTarget: string | undefined;
    readonly authorizer: Authorizer;
    readonly #verifier: ClaimsVerifier;
    readonly #logger: Logger;

    constructor(options: GuardOptions) {
        this.#verifier = options.verifier;
        this.authorizer = options.authorizer ?? new Authorizer();
        this.denyTarget = options.denyTarget;
        this.#logger = options.logger ?? getLogger("albgate.guard");
    }

    async authenticate(headers: HeaderSource): Promise<AuthDecision> {
        let identity: IdentityContext;
        try {
            identity = await IdentityContext.authenticate(extractTokenPair(headers), this.#verifier);
        } catch (err) {
            return this.#denyFromError(err);
        }

        const evaluation = this.authorizer.evaluate(identity);
        if (!evaluation.allowed) {
            const error = new UnauthorizedError(`${identity.email || identity.subject} is not authorized`);
            this.#logger.info("request denied", {
                reason: error.reason,
                subject: identity.subject,
                failedRules: evaluation.results.filter((r) => !r.passed).map((r) => r.rule.type),
            });
            return { type: "deny", reason: error.reason, message: error.message };
        }

        this.#logger.debug("request allowed", { subject: identity.subject });
        return { type: "allow", identity };
    }

    #denyFromError(err: unknown): DenyDecision {
        if (err instanceof AlbAuthError) {
            const attributes = { reason: err.reason, error: err.name, message: err.message };
            if (err.reason === DenyReason.KEY_FETCH_ERROR) {
                this.#logger.warn("request denied", attributes);
            } else {
                this.#logger.info("request denied", attributes);
            }
            return { type: "deny", reason: err.reason, message: err.message };
        }

        const message = err instanceof Error ? err.message : String(err);
        this.#logger.error("unexpected error while authenticating", { reason: DenyReason.INVALID_TOKEN, message });
        return { type: "deny", reason: DenyReason.INVALID_TOKEN, message };
    }
}

/**
 * Assemble a guard with its own key cache and verifier.
 */
export function createGuard(config: GuardConfig): Guard {
    const logger = config.logger ?? getLogger("albgate.guard");
    const keys = new KeyCache({
        ttlSeconds: config.cacheTtlSeconds,
        fetchTimeoutMs: config.fetchTimeoutMs,
        fetch: config.fetch,
        now: config.now,
        logger,
    });
    const verifier = new TokenVerifier(keys, {
        region: config.region,
        trustedIssuers: config.trustedIssuers,
        now: config.now,
    });
    return new Guard({
        verifier,
        authorizer: new Authorizer(config.rules, config.mode),
        denyTarget: config.denyTarget,
        logger,
    });
}
