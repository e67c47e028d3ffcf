/**
 * @albgate/auth
 *
 * Verification and authorization of the OIDC headers an application load
 * balancer forwards after login.
 *
 * @module @albgate/auth
 */

// Guard
export { createGuard, DENY_MESSAGES, Guard } from "./guard.ts";
export type { AllowDecision, AuthDecision, DenyDecision, GuardOptions } from "./guard.ts";

// Keys and tokens
export { jwksUrl, KeyCache, loadBalancerKeyUrl } from "./key-cache.ts";
export { TokenVerifier } from "./token-verifier.ts";
export type { ClaimsVerifier } from "./token-verifier.ts";
export { TtlCache } from "./cache.ts";

// Identity
export { IdentityContext } from "./identity.ts";
export { extractTokenPair, readHeader } from "./headers.ts";

// Authorization
export { Authorizer, domainRule, emailRule, evaluateRule, groupRule } from "./authorizer.ts";
export type { AuthorizerListOptions, AuthzEvaluation } from "./authorizer.ts";

// Configuration
export {
    AlbGateEnvSchema,
    AuthorizerConfigSchema,
    AuthzRuleSchema,
    authorizerFromConfig,
    BooleanFromStringSchema,
    CsvListSchema,
    guardConfigFromEnv,
    loadAuthorizerConfig,
    parseEnvConfig,
    RegionSchema,
    safeParseEnvConfig,
} from "./config.ts";
export type { AlbGateEnv, AuthorizerConfig } from "./config.ts";

// Adapters
export { getIdentity, identityStorage, requireIdentity } from "./context.ts";
export { createAlbAuthInterceptor, DENY_CODES } from "./connect-interceptor.ts";
export type { AlbAuthInterceptorOptions } from "./connect-interceptor.ts";
export { createHttpGuard, DenyResponse, httpStatusFor } from "./http-guard.ts";
export type { HttpGuardMiddleware, HttpGuardOptions, HttpGuardRequest, HttpGuardResponse } from "./http-guard.ts";

// Errors
export { AlbAuthError, ExpiredTokenError, InvalidTokenError, KeyFetchError, KeyNotFoundError, MissingTokenError, UnauthorizedError } from "./errors.ts";

// Types
export { AuthzMode, DenyReason, GROUPS_CLAIM, KeySource, RuleType, TOKEN_HEADERS } from "./types.ts";
export type {
    AuthorizableIdentity,
    AuthzRule,
    Claims,
    Clock,
    DomainRule,
    EmailRule,
    FetchLike,
    GroupRule,
    GuardConfig,
    HeaderSource,
    KeyAlgorithm,
    KeyCacheOptions,
    KeyLocator,
    KeyMaterial,
    RawTokenPair,
    TokenVerifierOptions,
    VerificationKey,
} from "./types.ts";
