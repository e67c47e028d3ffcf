/**
 * Token verification
 *
 * Verifies the two tokens the load balancer forwards:
 * - the identity token (`x-amzn-oidc-data`), ES256, signed by the load balancer;
 * - the access token (`x-amzn-oidc-accesstoken`), RS256, signed by the identity provider.
 *
 * @module token-verifier
 */

import * as jose from "jose";
import { ExpiredTokenError, InvalidTokenError, KeyNotFoundError } from "./errors.ts";
import type { KeyCache } from "./key-cache.ts";
import type { Claims, Clock, KeyAlgorithm, KeyLocator, KeyMaterial, TokenVerifierOptions } from "./types.ts";
import { KeySource } from "./types.ts";

/**
 * Anything that can turn the two raw tokens into verified claims.
 */
export interface ClaimsVerifier {
    verifyIdentityToken(raw: string): Promise<Claims>;
    verifyAccessToken(raw: string): Promise<Claims>;
}

// The load balancer pads its segments with "=", which base64url normally omits
const SEGMENT = /^[A-Za-z0-9_-]+={0,2}$/;

/**
 * Check the compact shape and return the unverified protected header.
 */
function decodeHeader(raw: string, label: string): jose.ProtectedHeaderParameters {
    const segments = raw.split(".");
    if (segments.length !== 3 || !segments.every((segment) => SEGMENT.test(segment))) {
        throw new InvalidTokenError(`${label} is not three base64url segments`);
    }
    try {
        return jose.decodeProtectedHeader(raw);
    } catch (err) {
        throw new InvalidTokenError(`${label} has an unreadable header`, { cause: err });
    }
}

function requireKeyId(header: jose.ProtectedHeaderParameters, label: string): string {
    if (typeof header.kid !== "string" || header.kid.length === 0) {
        throw new InvalidTokenError(`${label} header has no key id`);
    }
    return header.kid;
}

function requireAlgorithm(header: jose.ProtectedHeaderParameters, expected: KeyAlgorithm, label: string): void {
    if (header.alg !== expected) {
        throw new InvalidTokenError(`${label} must be signed with ${expected}, got ${String(header.alg)}`);
    }
}

/**
 * Issuers are fetched from, so only absolute https URLs qualify
 * (plain http is tolerated for localhost).
 */
function isFetchableIssuer(issuer: string): boolean {
    let url: URL;
    try {
        url = new URL(issuer);
    } catch {
        return false;
    }
    if (url.protocol === "https:") return true;
    return url.protocol === "http:" && (url.hostname === "localhost" || url.hostname === "127.0.0.1");
}

/**
 * Verifies both token types against keys resolved through a shared KeyCache.
 *
 * Neither token class is audience-checked and no clock-skew leeway is applied:
 * a token is expired as soon as `exp <= now`.
 *
 * @example
 * ```typescript
 * const verifier = new TokenVerifier(new KeyCache(), { region: "eu-west-2" });
 * const claims = await verifier.verifyIdentityToken(req.headers["x-amzn-oidc-data"]);
 * ```
 */
export class TokenVerifier implements ClaimsVerifier {
    readonly #keys: KeyCache;
    readonly #region: string;
    readonly #trustedIssuers: ReadonlySet<string> | undefined;
    readonly #now: Clock;

    constructor(keys: KeyCache, options: TokenVerifierOptions) {
        this.#keys = keys;
        this.#region = options.region;
        this.#trustedIssuers = options.trustedIssuers && options.trustedIssuers.length > 0 ? new Set(options.trustedIssuers) : undefined;
        this.#now = options.now ?? Date.now;
    }

    /**
     * Verify the load balancer's ES256 identity token.
     *
     * @throws InvalidTokenError on malformed segments, missing key id, unknown key or bad signature
     * @throws ExpiredTokenError when `exp <= now`
     * @throws KeyFetchError when the public key cannot be fetched
     */
    async verifyIdentityToken(raw: string): Promise<Claims> {
        const label = "Identity token";
        const header = decodeHeader(raw, label);
        requireAlgorithm(header, "ES256", label);
        const keyId = requireKeyId(header, label);

        const material = await this.#resolve(keyId, { source: KeySource.LOAD_BALANCER, region: this.#region }, label);
        return await this.#verify(raw, material, label);
    }

    /**
     * Verify the identity provider's RS256 access token.
     *
     * The issuer is read from the unverified payload to locate the key set;
     * the signature check that follows covers it.
     *
     * @throws InvalidTokenError on malformed segments, missing or untrusted issuer, unknown key or bad signature
     * @throws ExpiredTokenError when `exp <= now`
     * @throws KeyFetchError when the key set cannot be fetched
     */
    async verifyAccessToken(raw: string): Promise<Claims> {
        const label = "Access token";
        const header = decodeHeader(raw, label);
        requireAlgorithm(header, "RS256", label);
        const keyId = requireKeyId(header, label);

        let unverified: jose.JWTPayload;
        try {
            unverified = jose.decodeJwt(raw);
        } catch (err) {
            throw new InvalidTokenError(`${label} has an unreadable payload`, { cause: err });
        }

        const issuer = unverified.iss;
        if (typeof issuer !== "string" || issuer.length === 0) {
            throw new InvalidTokenError(`${label} has no issuer`);
        }
        if (this.#trustedIssuers && !this.#trustedIssuers.has(issuer)) {
            throw new InvalidTokenError(`${label} issuer ${issuer} is not trusted`);
        }
        if (!isFetchableIssuer(issuer)) {
            throw new InvalidTokenError(`${label} issuer ${issuer} is not an https URL`);
        }

        const material = await this.#resolve(keyId, { source: KeySource.IDENTITY_PROVIDER, issuer }, label);
        return await this.#verify(raw, material, label);
    }

    async #resolve(keyId: string, locator: KeyLocator, label: string): Promise<KeyMaterial> {
        try {
            return await this.#keys.resolve(keyId, locator);
        } catch (err) {
            if (err instanceof KeyNotFoundError) {
                throw new InvalidTokenError(`${label} is signed with unknown key ${keyId}`, { cause: err });
            }
            throw err;
        }
    }

    async #verify(raw: string, material: KeyMaterial, label: string): Promise<Claims> {
        try {
            const { payload } = await jose.jwtVerify(raw, material.key, {
                algorithms: [material.algorithm],
                currentDate: new Date(this.#now()),
                requiredClaims: ["exp"],
            });
            return Object.freeze({ ...payload });
        } catch (err) {
            if (err instanceof jose.errors.JWTExpired) {
                throw new ExpiredTokenError(`${label} has expired`, { cause: err });
            }
            throw new InvalidTokenError(`${label} failed verification`, { cause: err });
        }
    }
}
