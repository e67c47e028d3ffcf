/**
 * Shared types for @albgate/auth
 *
 * @module types
 */

import type { Logger } from "@albgate/otel";
import type { importJWK } from "jose";

/**
 * Request headers the load balancer attaches after a successful OIDC login.
 *
 * Header lookup is case-insensitive.
 */
export const TOKEN_HEADERS = {
    /** ES256 token signed by the load balancer, carries the user claims */
    IDENTITY: "x-amzn-oidc-data",
    /** RS256 access token issued by the identity provider */
    ACCESS: "x-amzn-oidc-accesstoken",
} as const;

/** Access-token claim listing the identity provider groups of the user */
export const GROUPS_CLAIM = "cognito:groups";

/**
 * The two raw tokens forwarded by the load balancer.
 */
export interface RawTokenPair {
    readonly identityToken: string;
    readonly accessToken: string;
}

/**
 * Decoded token payload. JSON-compatible values only.
 */
export type Claims = Readonly<Record<string, unknown>>;

/**
 * Milliseconds since the epoch. Injected wherever time matters so tests can
 * drive expiry deterministically.
 */
export type Clock = () => number;

/**
 * The subset of fetch() the key cache relies on.
 */
export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

/**
 * Header containers accepted by the guard: WHATWG Headers (ConnectRPC, fetch)
 * or Node's IncomingHttpHeaders-style records.
 */
export type HeaderSource = Headers | Readonly<Record<string, string | ReadonlyArray<string> | undefined>>;

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

/**
 * Where a signing key comes from.
 */
export const KeySource = {
    /** Per-region endpoint serving one PEM key per key id */
    LOAD_BALANCER: "load-balancer",
    /** Per-issuer JSON Web Key Set */
    IDENTITY_PROVIDER: "identity-provider",
} as const;

export type KeySource = (typeof KeySource)[keyof typeof KeySource];

/** Signature algorithm pinned per key source */
export type KeyAlgorithm = "ES256" | "RS256";

/** Public key as produced by jose's importers */
export type VerificationKey = Awaited<ReturnType<typeof importJWK>>;

/**
 * Identifies the cache a key id is resolved against.
 */
export type KeyLocator =
    | { readonly source: typeof KeySource.LOAD_BALANCER; readonly region: string }
    | { readonly source: typeof KeySource.IDENTITY_PROVIDER; readonly issuer: string };

/**
 * A resolved public key.
 */
export interface KeyMaterial {
    readonly keyId: string;
    readonly source: KeySource;
    /** Region for load-balancer keys, issuer URL for identity-provider keys */
    readonly origin: string;
    readonly algorithm: KeyAlgorithm;
    readonly key: VerificationKey;
    /** Clock reading when the key was fetched */
    readonly fetchedAt: number;
}

// ---------------------------------------------------------------------------
// Authorization
// ---------------------------------------------------------------------------

/**
 * How rule results combine.
 */
export const AuthzMode = {
    /** Every rule must pass */
    ALL: "all",
    /** At least one rule must pass */
    ANY: "any",
} as const;

export type AuthzMode = (typeof AuthzMode)[keyof typeof AuthzMode];

export const RuleType = {
    DOMAIN: "domain",
    GROUP: "group",
    EMAIL: "email",
} as const;

export type RuleType = (typeof RuleType)[keyof typeof RuleType];

/** Passes when the email domain is in the allowed set */
export interface DomainRule {
    readonly type: typeof RuleType.DOMAIN;
    readonly allowed: ReadonlySet<string>;
}

/** Passes when any group of the identity is in the allowed set */
export interface GroupRule {
    readonly type: typeof RuleType.GROUP;
    readonly allowed: ReadonlySet<string>;
}

/** Passes when the email is in the allowed set */
export interface EmailRule {
    readonly type: typeof RuleType.EMAIL;
    readonly allowed: ReadonlySet<string>;
}

export type AuthzRule = DomainRule | GroupRule | EmailRule;

/**
 * The identity surface rules are evaluated against.
 */
export interface AuthorizableIdentity {
    readonly isAuthenticated: boolean;
    readonly email: string;
    readonly emailDomain: string;
    readonly groups: ReadonlyArray<string>;
}

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

/**
 * Reason codes carried by a deny decision.
 */
export const DenyReason = {
    MISSING_TOKEN: "missing_token",
    INVALID_TOKEN: "invalid_token",
    EXPIRED_TOKEN: "expired_token",
    KEY_FETCH_ERROR: "key_fetch_error",
    UNAUTHORIZED: "unauthorized",
} as const;

export type DenyReason = (typeof DenyReason)[keyof typeof DenyReason];

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Key cache options
 */
export interface KeyCacheOptions {
    /**
     * Lifetime of a fetched identity-provider key set, in seconds.
     * Load-balancer keys never expire.
     * @default 3600
     */
    readonly ttlSeconds?: number | undefined;
    /**
     * Timeout for a single key fetch, in milliseconds.
     * @default 10000
     */
    readonly fetchTimeoutMs?: number | undefined;
    /** @default globalThis.fetch */
    readonly fetch?: FetchLike | undefined;
    /** @default Date.now */
    readonly now?: Clock | undefined;
    /** @default getLogger("albgate.keys") */
    readonly logger?: Logger | undefined;
}

/**
 * Token verifier options
 */
export interface TokenVerifierOptions {
    /** Region of the load balancer; selects the public key endpoint */
    readonly region: string;
    /**
     * When set, access tokens from any other issuer are rejected before
     * their key set is fetched.
     */
    readonly trustedIssuers?: ReadonlyArray<string> | undefined;
    /** @default Date.now */
    readonly now?: Clock | undefined;
}

/**
 * Everything needed to assemble a guard from scratch.
 */
export interface GuardConfig {
    readonly region: string;
    /** @default 3600 */
    readonly cacheTtlSeconds?: number | undefined;
    /** @default 10000 */
    readonly fetchTimeoutMs?: number | undefined;
    readonly trustedIssuers?: ReadonlyArray<string> | undefined;
    /** Opaque value handed to adapters, typically a redirect URL */
    readonly denyTarget?: string | undefined;
    readonly rules?: ReadonlyArray<AuthzRule> | undefined;
    /** @default "any" */
    readonly mode?: AuthzMode | undefined;
    readonly fetch?: FetchLike | undefined;
    readonly now?: Clock | undefined;
    /** Used by the guard and handed down to the key cache */
    readonly logger?: Logger | undefined;
}
