/**
 * Identity context
 *
 * Read-only view over the verified claims of one request.
 *
 * @module identity
 */

import { MissingTokenError } from "./errors.ts";
import type { ClaimsVerifier } from "./token-verifier.ts";
import type { AuthorizableIdentity, Claims, RawTokenPair } from "./types.ts";
import { GROUPS_CLAIM, TOKEN_HEADERS } from "./types.ts";

function stringClaim(claims: Claims, name: string): string {
    const value = claims[name];
    return typeof value === "string" ? value : "";
}

/**
 * The authenticated user behind a request.
 *
 * Only obtainable from verified claims, so every instance is authenticated.
 * The claim maps are copied on the way in and on the way out; nothing a
 * caller does to a returned map reaches the instance.
 */
export class IdentityContext implements AuthorizableIdentity {
    readonly isAuthenticated = true;
    readonly #identityClaims: Claims;
    readonly #accessClaims: Claims;

    private constructor(identityClaims: Claims, accessClaims: Claims) {
        this.#identityClaims = structuredClone(identityClaims);
        this.#accessClaims = structuredClone(accessClaims);
        Object.freeze(this);
    }

    /**
     * Build an identity from already verified claims.
     */
    static build(identityClaims: Claims, accessClaims: Claims): IdentityContext {
        return new IdentityContext(identityClaims, accessClaims);
    }

    /**
     * Verify a raw token pair and build the identity.
     *
     * Both tokens must be present before any verification starts. The identity
     * token is verified first; the access token only once it passed.
     *
     * @throws MissingTokenError when either token is absent or empty
     */
    static async authenticate(tokens: Partial<RawTokenPair>, verifier: ClaimsVerifier): Promise<IdentityContext> {
        const { identityToken, accessToken } = tokens;
        if (!identityToken) {
            throw new MissingTokenError(`${TOKEN_HEADERS.IDENTITY} header is required`);
        }
        if (!accessToken) {
            throw new MissingTokenError(`${TOKEN_HEADERS.ACCESS} header is required`);
        }

        const identityClaims = await verifier.verifyIdentityToken(identityToken);
        const accessClaims = await verifier.verifyAccessToken(accessToken);
        return IdentityContext.build(identityClaims, accessClaims);
    }

    /** Unique user id (`sub`) */
    get subject(): string {
        return stringClaim(this.#identityClaims, "sub");
    }

    get username(): string {
        return stringClaim(this.#identityClaims, "username");
    }

    get email(): string {
        return stringClaim(this.#identityClaims, "email");
    }

    /** Part of the email after the last `@`, empty when there is none */
    get emailDomain(): string {
        const email = this.email;
        const at = email.lastIndexOf("@");
        return at === -1 ? "" : email.slice(at + 1);
    }

    /** The provider sends `email_verified` as the string "true" */
    get emailVerified(): boolean {
        const value = this.#identityClaims.email_verified;
        return value === "true" || value === true;
    }

    /** Expiry of the identity token */
    get expiresAt(): Date | undefined {
        const exp = this.#identityClaims.exp;
        return typeof exp === "number" ? new Date(exp * 1000) : undefined;
    }

    get issuer(): string {
        return stringClaim(this.#identityClaims, "iss");
    }

    /** Identity provider groups from the access token */
    get groups(): string[] {
        const value = this.#accessClaims[GROUPS_CLAIM];
        return Array.isArray(value) ? value.filter((group): group is string => typeof group === "string") : [];
    }

    /** Copy of all identity-token claims */
    get identityClaims(): Record<string, unknown> {
        return structuredClone(this.#identityClaims);
    }

    /** Copy of all access-token claims */
    get accessClaims(): Record<string, unknown> {
        return structuredClone(this.#accessClaims);
    }

    toJSON(): Record<string, unknown> {
        return {
            subject: this.subject,
            username: this.username,
            email: this.email,
            emailVerified: this.emailVerified,
            issuer: this.issuer,
            groups: this.groups,
            expiresAt: this.expiresAt?.toISOString(),
        };
    }

    toString(): string {
        return `${this.username} (${this.email})`;
    }
}
