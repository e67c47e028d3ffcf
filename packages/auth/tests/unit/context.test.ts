/**
 * Unit tests for identity context storage
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import { getIdentity, identityStorage, requireIdentity } from "../../src/context.ts";
import { MissingTokenError } from "../../src/errors.ts";
import { IdentityContext } from "../../src/identity.ts";

const identity = IdentityContext.build({ sub: "user-1", email: "alice@example.com" }, {});

describe("identity context", () => {
    it("should return undefined outside a request", () => {
        assert.strictEqual(getIdentity(), undefined);
    });

    it("should throw MissingTokenError outside a request", () => {
        assert.throws(() => requireIdentity(), MissingTokenError);
    });

    it("should return the identity inside run()", () => {
        identityStorage.run(identity, () => {
            assert.strictEqual(getIdentity(), identity);
            assert.strictEqual(requireIdentity().subject, "user-1");
        });
    });

    it("should propagate through async continuations", async () => {
        await identityStorage.run(identity, async () => {
            await new Promise((resolve) => setTimeout(resolve, 1));
            assert.strictEqual(getIdentity()?.email, "alice@example.com");
        });
    });

    it("should isolate concurrent runs", async () => {
        const other = IdentityContext.build({ sub: "user-2" }, {});

        const seen = await Promise.all(
            [identity, other].map((current, index) =>
                identityStorage.run(current, async () => {
                    await new Promise((resolve) => setTimeout(resolve, 5 - index * 4));
                    return getIdentity()?.subject;
                }),
            ),
        );

        assert.deepStrictEqual(seen, ["user-1", "user-2"]);
    });
});
