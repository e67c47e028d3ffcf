/**
 * Auth-specific error types
 *
 * Every failure on the verification path is an AlbAuthError carrying the
 * deny reason the guard reports for it.
 *
 * @module errors
 */

import type { DenyReason } from "./types.ts";

/**
 * Base class for authentication and authorization failures.
 */
export class AlbAuthError extends Error {
    readonly reason: DenyReason;

    constructor(reason: DenyReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "AlbAuthError";
        this.reason = reason;
    }
}

/**
 * One of the two token headers is absent or empty.
 */
export class MissingTokenError extends AlbAuthError {
    constructor(message: string) {
        super("missing_token", message);
        this.name = "MissingTokenError";
    }
}

/**
 * Malformed token, missing key id, unknown key, wrong algorithm or bad signature.
 */
export class InvalidTokenError extends AlbAuthError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("invalid_token", message, options);
        this.name = "InvalidTokenError";
    }
}

/**
 * The token's `exp` claim is not in the future.
 */
export class ExpiredTokenError extends AlbAuthError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("expired_token", message, options);
        this.name = "ExpiredTokenError";
    }
}

/**
 * Fetching key material failed: network error, timeout, non-2xx status
 * or an unusable response body.
 */
export class KeyFetchError extends AlbAuthError {
    readonly url: string;

    constructor(url: string, message: string, options?: { cause?: unknown }) {
        super("key_fetch_error", message, options);
        this.name = "KeyFetchError";
        this.url = url;
    }
}

/**
 * The fetched key set has no key with the requested id.
 *
 * Reported as an invalid token: the token names a key its issuer never published.
 */
export class KeyNotFoundError extends AlbAuthError {
    readonly keyId: string;

    constructor(keyId: string, origin: string) {
        super("invalid_token", `No key "${keyId}" published by ${origin}`);
        this.name = "KeyNotFoundError";
        this.keyId = keyId;
    }
}

/**
 * The identity is authenticated but no authorization rule admits it.
 */
export class UnauthorizedError extends AlbAuthError {
    constructor(message = "Access denied") {
        super("unauthorized", message);
        this.name = "UnauthorizedError";
    }
}
