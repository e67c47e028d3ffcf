/**
 * Unit tests for IdentityContext
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { MissingTokenError } from "../../src/errors.ts";
import { IdentityContext } from "../../src/identity.ts";
import type { ClaimsVerifier } from "../../src/token-verifier.ts";
import type { Claims } from "../../src/types.ts";

const IDENTITY_CLAIMS = {
    sub: "user-1",
    email: "alice@example.com",
    email_verified: "true",
    username: "alice",
    exp: 1_704_070_800,
    iss: "https://issuer.test/pool",
};

const ACCESS_CLAIMS = {
    sub: "user-1",
    "cognito:groups": ["admins", "staff"],
};

/**
 * Verifier returning fixed claims and recording what it was asked to verify.
 */
function createStubVerifier(identity: Claims = IDENTITY_CLAIMS, access: Claims = ACCESS_CLAIMS) {
    const calls: string[] = [];
    const verifier: ClaimsVerifier = {
        async verifyIdentityToken(raw) {
            calls.push(`identity:${raw}`);
            return identity;
        },
        async verifyAccessToken(raw) {
            calls.push(`access:${raw}`);
            return access;
        },
    };
    return { verifier, calls };
}

describe("IdentityContext", () => {
    describe("accessors", () => {
        it("should expose the identity token claims", () => {
            const identity = IdentityContext.build(IDENTITY_CLAIMS, ACCESS_CLAIMS);

            assert.strictEqual(identity.isAuthenticated, true);
            assert.strictEqual(identity.subject, "user-1");
            assert.strictEqual(identity.username, "alice");
            assert.strictEqual(identity.email, "alice@example.com");
            assert.strictEqual(identity.emailDomain, "example.com");
            assert.strictEqual(identity.emailVerified, true);
            assert.strictEqual(identity.issuer, "https://issuer.test/pool");
            assert.deepStrictEqual(identity.expiresAt, new Date(1_704_070_800_000));
        });

        it("should read groups from the access token", () => {
            const identity = IdentityContext.build(IDENTITY_CLAIMS, ACCESS_CLAIMS);
            assert.deepStrictEqual(identity.groups, ["admins", "staff"]);
        });

        it("should default missing claims", () => {
            const identity = IdentityContext.build({}, {});

            assert.strictEqual(identity.subject, "");
            assert.strictEqual(identity.email, "");
            assert.strictEqual(identity.emailDomain, "");
            assert.strictEqual(identity.emailVerified, false);
            assert.strictEqual(identity.expiresAt, undefined);
            assert.deepStrictEqual(identity.groups, []);
        });

        it("should take the domain after the last @", () => {
            const identity = IdentityContext.build({ email: "odd@name@example.org" }, {});
            assert.strictEqual(identity.emailDomain, "example.org");
        });

        it("should return an empty domain for an email without @", () => {
            const identity = IdentityContext.build({ email: "not-an-email" }, {});
            assert.strictEqual(identity.emailDomain, "");
        });

        it("should ignore non-string group entries", () => {
            const identity = IdentityContext.build({}, { "cognito:groups": ["ok", 7, null] });
            assert.deepStrictEqual(identity.groups, ["ok"]);
        });

        it("should accept a boolean email_verified", () => {
            assert.strictEqual(IdentityContext.build({ email_verified: true }, {}).emailVerified, true);
            assert.strictEqual(IdentityContext.build({ email_verified: "false" }, {}).emailVerified, false);
        });
    });

    describe("immutability", () => {
        it("should not share claim maps with the caller", () => {
            const source = { ...IDENTITY_CLAIMS };
            const identity = IdentityContext.build(source, ACCESS_CLAIMS);

            source.email = "mallory@example.com";
            const copy = identity.identityClaims;
            copy.email = "mallory@example.com";

            assert.strictEqual(identity.email, "alice@example.com");
            assert.strictEqual(identity.identityClaims.email, "alice@example.com");
        });

        it("should not expose the internal groups array", () => {
            const identity = IdentityContext.build(IDENTITY_CLAIMS, ACCESS_CLAIMS);
            identity.groups.push("root");
            assert.deepStrictEqual(identity.groups, ["admins", "staff"]);
        });

        it("should be frozen", () => {
            const identity = IdentityContext.build(IDENTITY_CLAIMS, ACCESS_CLAIMS);
            assert.ok(Object.isFrozen(identity));
        });
    });

    describe("serialization", () => {
        it("should render as username and email", () => {
            const identity = IdentityContext.build(IDENTITY_CLAIMS, ACCESS_CLAIMS);
            assert.strictEqual(String(identity), "alice (alice@example.com)");
        });

        it("should serialize the public view", () => {
            const identity = IdentityContext.build(IDENTITY_CLAIMS, ACCESS_CLAIMS);

            assert.deepStrictEqual(JSON.parse(JSON.stringify(identity)), {
                subject: "user-1",
                username: "alice",
                email: "alice@example.com",
                emailVerified: true,
                issuer: "https://issuer.test/pool",
                groups: ["admins", "staff"],
                expiresAt: "2024-01-01T01:00:00.000Z",
            });
        });
    });

    describe("authenticate", () => {
        it("should verify the identity token before the access token", async () => {
            const { verifier, calls } = createStubVerifier();

            const identity = await IdentityContext.authenticate({ identityToken: "id", accessToken: "at" }, verifier);

            assert.deepStrictEqual(calls, ["identity:id", "access:at"]);
            assert.strictEqual(identity.email, "alice@example.com");
        });

        it("should require both tokens before verifying anything", async () => {
            const { verifier, calls } = createStubVerifier();

            await assert.rejects(IdentityContext.authenticate({ accessToken: "at" }, verifier), {
                name: "MissingTokenError",
                message: "x-amzn-oidc-data header is required",
            });
            await assert.rejects(IdentityContext.authenticate({ identityToken: "id", accessToken: "" }, verifier), {
                name: "MissingTokenError",
                message: "x-amzn-oidc-accesstoken header is required",
            });
            await assert.rejects(IdentityContext.authenticate({}, verifier), MissingTokenError);
            assert.deepStrictEqual(calls, []);
        });

        it("should not verify the access token once the identity token failed", async () => {
            const calls: string[] = [];
            const verifier: ClaimsVerifier = {
                async verifyIdentityToken() {
                    throw new Error("bad identity token");
                },
                async verifyAccessToken(raw) {
                    calls.push(raw);
                    return {};
                },
            };

            await assert.rejects(IdentityContext.authenticate({ identityToken: "id", accessToken: "at" }, verifier), { message: "bad identity token" });
            assert.deepStrictEqual(calls, []);
        });
    });
});
