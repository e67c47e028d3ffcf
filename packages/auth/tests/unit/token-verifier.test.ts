/**
 * Unit tests for TokenVerifier
 */

import assert from "node:assert";
import { beforeEach, describe, it } from "node:test";
import * as jose from "jose";
import { ExpiredTokenError, InvalidTokenError, KeyFetchError } from "../../src/errors.ts";
import { KeyCache } from "../../src/key-cache.ts";
import { tamperSignature, TestEnvironment } from "../../src/testing/test-environment.ts";
import { TokenVerifier } from "../../src/token-verifier.ts";
import type { TokenVerifierOptions } from "../../src/types.ts";

const USER = { sub: "user-1", email: "alice@example.com", username: "alice", groups: ["admins"] };

describe("TokenVerifier", () => {
    let env: TestEnvironment;

    beforeEach(async () => {
        env = await TestEnvironment.create();
    });

    function createVerifier(options: Partial<TokenVerifierOptions> = {}) {
        const keys = new KeyCache({ fetch: env.fetch.fetch, now: env.clock.now, logger: env.logger });
        return new TokenVerifier(keys, { region: env.region, now: env.clock.now, ...options });
    }

    describe("identity token", () => {
        it("should return the claims of a valid token", async () => {
            const token = await env.identityToken(env.identityClaims(USER));

            const claims = await createVerifier().verifyIdentityToken(token);

            assert.strictEqual(claims.sub, "user-1");
            assert.strictEqual(claims.email, "alice@example.com");
            assert.strictEqual(claims.email_verified, "true");
            assert.strictEqual(claims.exp, env.clock.seconds() + 3600);
            assert.ok(Object.isFrozen(claims));
        });

        it("should treat exp equal to now as expired", async () => {
            const token = await env.identityToken(env.identityClaims(USER), { exp: env.clock.seconds() });

            await assert.rejects(createVerifier().verifyIdentityToken(token), (err: unknown) => {
                assert.ok(err instanceof ExpiredTokenError);
                assert.strictEqual(err.reason, "expired_token");
                assert.strictEqual(err.message, "Identity token has expired");
                return true;
            });
        });

        it("should expire a token once the clock passes exp", async () => {
            const verifier = createVerifier();
            const token = await env.identityToken(env.identityClaims(USER), { exp: env.clock.seconds() + 60 });

            await verifier.verifyIdentityToken(token);
            env.clock.advance(60_000);

            await assert.rejects(verifier.verifyIdentityToken(token), ExpiredTokenError);
        });

        it("should require an exp claim", async () => {
            const token = await env.identityToken(env.identityClaims(USER), { exp: null });

            await assert.rejects(createVerifier().verifyIdentityToken(token), { name: "InvalidTokenError", message: "Identity token failed verification" });
        });

        it("should reject a tampered signature", async () => {
            const token = tamperSignature(await env.identityToken(env.identityClaims(USER)));

            await assert.rejects(createVerifier().verifyIdentityToken(token), InvalidTokenError);
        });

        it("should reject a token that is not three segments", async () => {
            await assert.rejects(createVerifier().verifyIdentityToken("abc.def"), { message: "Identity token is not three base64url segments" });
            await assert.rejects(createVerifier().verifyIdentityToken("a.b.c.d"), InvalidTokenError);
            await assert.rejects(createVerifier().verifyIdentityToken("a b.c.d"), InvalidTokenError);
            assert.strictEqual(env.fetch.calls.length, 0);
        });

        it("should reject an unreadable header", async () => {
            await assert.rejects(createVerifier().verifyIdentityToken("AAAA.BBBB.CCCC"), { message: "Identity token has an unreadable header" });
        });

        it("should reject a header without a key id before fetching", async () => {
            const token = await env.identityToken(env.identityClaims(USER), { keyId: "" });

            await assert.rejects(createVerifier().verifyIdentityToken(token), { message: "Identity token header has no key id" });
            assert.strictEqual(env.fetch.calls.length, 0);
        });

        it("should reject any algorithm other than ES256 before fetching", async () => {
            const token = await env.accessToken(env.identityClaims(USER));

            await assert.rejects(createVerifier().verifyIdentityToken(token), { message: "Identity token must be signed with ES256, got RS256" });
            assert.strictEqual(env.fetch.calls.length, 0);
        });

        it("should surface key fetch failures", async () => {
            const token = await env.identityToken(env.identityClaims(USER), { keyId: "retired-key" });

            await assert.rejects(createVerifier().verifyIdentityToken(token), KeyFetchError);
        });

        it("should accept base64url padding in the segments", async () => {
            const token = await env.identityToken(env.identityClaims(USER));
            const [header = "", payload = "", signature = ""] = token.split(".");
            const pad = (segment: string) => segment + "=".repeat((4 - (segment.length % 4)) % 4);
            // Padding on the signature alone leaves the signing input untouched
            const padded = `${header}.${payload}.${pad(signature)}`;

            const claims = await createVerifier().verifyIdentityToken(padded);

            assert.strictEqual(claims.sub, "user-1");
        });
    });

    describe("access token", () => {
        it("should return the claims of a valid token", async () => {
            const token = await env.accessToken(env.accessClaims(USER));

            const claims = await createVerifier().verifyAccessToken(token);

            assert.strictEqual(claims.sub, "user-1");
            assert.deepStrictEqual(claims["cognito:groups"], ["admins"]);
            assert.deepStrictEqual(env.fetch.calls, [env.jwksUrl]);
        });

        it("should reject an expired token", async () => {
            const token = await env.accessToken(env.accessClaims(USER), { exp: env.clock.seconds() - 1 });

            await assert.rejects(createVerifier().verifyAccessToken(token), { name: "ExpiredTokenError", message: "Access token has expired" });
        });

        it("should reject a tampered signature", async () => {
            const token = tamperSignature(await env.accessToken(env.accessClaims(USER)));

            await assert.rejects(createVerifier().verifyAccessToken(token), { name: "InvalidTokenError", message: "Access token failed verification" });
        });

        it("should reject a token without an issuer", async () => {
            const { iss: _iss, ...claims } = env.accessClaims(USER);
            const token = await env.accessToken(claims);

            await assert.rejects(createVerifier().verifyAccessToken(token), { message: "Access token has no issuer" });
        });

        it("should reject an untrusted issuer without fetching", async () => {
            const token = await env.accessToken({ ...env.accessClaims(USER), iss: "https://evil.test" });

            await assert.rejects(createVerifier({ trustedIssuers: [env.issuer] }).verifyAccessToken(token), {
                message: "Access token issuer https://evil.test is not trusted",
            });
            assert.strictEqual(env.fetch.calls.length, 0);
        });

        it("should reject a non-https issuer", async () => {
            const token = await env.accessToken({ ...env.accessClaims(USER), iss: "http://issuer.test" });

            await assert.rejects(createVerifier().verifyAccessToken(token), { message: "Access token issuer http://issuer.test is not an https URL" });
            assert.strictEqual(env.fetch.calls.length, 0);
        });

        it("should report an unknown key id as an invalid token", async () => {
            const token = await env.accessToken(env.accessClaims(USER), { keyId: "rotated-away" });

            await assert.rejects(createVerifier().verifyAccessToken(token), (err: unknown) => {
                assert.ok(err instanceof InvalidTokenError);
                assert.strictEqual(err.message, "Access token is signed with unknown key rotated-away");
                return true;
            });
        });

        it("should reject an HS256 token", async () => {
            const token = await new jose.SignJWT({ iss: env.issuer, exp: env.clock.seconds() + 60 })
                .setProtectedHeader({ alg: "HS256", kid: "issuer-key-1" })
                .sign(new TextEncoder().encode("test-secret"));

            await assert.rejects(createVerifier().verifyAccessToken(token), { message: "Access token must be signed with RS256, got HS256" });
        });
    });
});
