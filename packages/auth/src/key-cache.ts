/**
 * Signing key resolution
 *
 * Fetches and caches the public keys both tokens are verified against:
 * - load-balancer keys, one PEM document per key id, cached forever
 *   (a key id is never reused for a different key);
 * - identity-provider key sets, one JWKS per issuer, cached for a TTL.
 *
 * @module key-cache
 */

import type { Logger } from "@albgate/otel";
import { getLogger } from "@albgate/otel";
import { TaskCancelledError, TimeoutStrategy, timeout } from "cockatiel";
import type { TimeoutPolicy } from "cockatiel";
import * as jose from "jose";
import { z } from "zod";
import { TtlCache } from "./cache.ts";
import { KeyFetchError, KeyNotFoundError } from "./errors.ts";
import type { Clock, FetchLike, KeyCacheOptions, KeyLocator, KeyMaterial } from "./types.ts";
import { KeySource } from "./types.ts";

const DEFAULT_TTL_SECONDS = 3600;
const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/**
 * Shape of a JWKS document. Only the members needed to import RSA keys are kept.
 */
const JwksSchema = z.object({
    keys: z.array(
        z.object({
            kty: z.string(),
            kid: z.string().optional(),
            alg: z.string().optional(),
            use: z.string().optional(),
            n: z.string().optional(),
            e: z.string().optional(),
        }),
    ),
});

/**
 * URL of the public key the load balancer signed with.
 */
export function loadBalancerKeyUrl(region: string, keyId: string): string {
    return `https://public-keys.auth.elb.${region}.amazonaws.com/${encodeURIComponent(keyId)}`;
}

/**
 * URL of an issuer's JSON Web Key Set.
 */
export function jwksUrl(issuer: string): string {
    return `${issuer.replace(/\/+$/, "")}/.well-known/jwks.json`;
}

/**
 * Resolves key ids to imported public keys with as few round-trips as possible.
 *
 * One instance is meant to live for the whole process and be shared by all
 * requests. Concurrent misses on the same key id (or issuer) share a single
 * fetch; failures are not cached, so the next request simply retries.
 *
 * @example
 * ```typescript
 * const keys = new KeyCache({ ttlSeconds: 3600, fetchTimeoutMs: 10_000 });
 * const material = await keys.resolve(kid, { source: KeySource.LOAD_BALANCER, region: "eu-west-2" });
 * ```
 */
export class KeyCache {
    readonly #loadBalancerKeys: TtlCache<KeyMaterial>;
    readonly #issuerKeySets: TtlCache<ReadonlyMap<string, KeyMaterial>>;
    readonly #fetch: FetchLike;
    readonly #now: Clock;
    readonly #logger: Logger;
    readonly #fetchTimeoutMs: number;
    readonly #timeout: TimeoutPolicy;

    constructor(options: KeyCacheOptions = {}) {
        const ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
        this.#fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
        if (this.#fetchTimeoutMs <= 0 || !Number.isFinite(this.#fetchTimeoutMs)) {
            throw new RangeError("fetchTimeoutMs must be a positive finite number");
        }

        this.#now = options.now ?? Date.now;
        this.#fetch = options.fetch ?? ((url, init) => fetch(url, init));
        this.#logger = options.logger ?? getLogger("albgate.keys");
        this.#loadBalancerKeys = new TtlCache({ ttl: Number.POSITIVE_INFINITY, now: this.#now });
        this.#issuerKeySets = new TtlCache({ ttl: ttlSeconds * 1000, now: this.#now });
        this.#timeout = timeout(this.#fetchTimeoutMs, TimeoutStrategy.Aggressive);
    }

    /**
     * Resolve a key id against the given source.
     *
     * @throws KeyFetchError when the key (set) cannot be fetched or imported
     * @throws KeyNotFoundError when the issuer's key set has no such key id
     */
    async resolve(keyId: string, locator: KeyLocator): Promise<KeyMaterial> {
        switch (locator.source) {
            case KeySource.LOAD_BALANCER:
                return await this.#resolveLoadBalancerKey(keyId, locator.region);
            case KeySource.IDENTITY_PROVIDER:
                return await this.#resolveIssuerKey(keyId, locator.issuer);
        }
    }

    async #resolveLoadBalancerKey(keyId: string, region: string): Promise<KeyMaterial> {
        const cacheKey = `${region}/${keyId}`;
        const cached = this.#loadBalancerKeys.get(cacheKey);
        if (cached) {
            this.#logger.debug("load balancer key cache hit", { keyId, region });
            return cached;
        }

        return await this.#loadBalancerKeys.getOrLoad(cacheKey, async () => {
            const url = loadBalancerKeyUrl(region, keyId);
            const pem = await this.#request(url, (response) => response.text());

            let key: KeyMaterial["key"];
            try {
                key = await jose.importSPKI(pem.trim(), "ES256");
            } catch (err) {
                throw new KeyFetchError(url, `Response from ${url} is not an ES256 public key`, { cause: err });
            }

            return { keyId, source: KeySource.LOAD_BALANCER, origin: region, algorithm: "ES256", key, fetchedAt: this.#now() };
        });
    }

    async #resolveIssuerKey(keyId: string, issuer: string): Promise<KeyMaterial> {
        let keySet = this.#issuerKeySets.get(issuer);
        if (keySet) {
            this.#logger.debug("issuer key set cache hit", { keyId, issuer });
        } else {
            keySet = await this.#issuerKeySets.getOrLoad(issuer, () => this.#loadKeySet(issuer));
        }

        const material = keySet.get(keyId);
        if (!material) {
            throw new KeyNotFoundError(keyId, issuer);
        }
        return material;
    }

    async #loadKeySet(issuer: string): Promise<ReadonlyMap<string, KeyMaterial>> {
        const url = jwksUrl(issuer);
        const body = await this.#request(url, (response) => response.json());

        const parsed = JwksSchema.safeParse(body);
        if (!parsed.success) {
            throw new KeyFetchError(url, `Response from ${url} is not a JSON Web Key Set`, { cause: parsed.error });
        }

        const fetchedAt = this.#now();
        const keys = new Map<string, KeyMaterial>();
        for (const jwk of parsed.data.keys) {
            if (!jwk.kid || jwk.kty !== "RSA") {
                this.#logger.warn("skipping unusable key in key set", { issuer, kid: jwk.kid ?? "", kty: jwk.kty });
                continue;
            }
            try {
                const key = await jose.importJWK(jwk, "RS256");
                keys.set(jwk.kid, { keyId: jwk.kid, source: KeySource.IDENTITY_PROVIDER, origin: issuer, algorithm: "RS256", key, fetchedAt });
            } catch (err) {
                this.#logger.warn("skipping key that failed to import", { issuer, kid: jwk.kid, error: String(err) });
            }
        }

        this.#logger.debug("fetched issuer key set", { issuer, keys: keys.size });
        return keys;
    }

    /**
     * GET a URL under the fetch timeout and read its body.
     */
    async #request<T>(url: string, read: (response: Response) => Promise<T>): Promise<T> {
        this.#logger.debug("fetching key material", { url });
        try {
            return await this.#timeout.execute(async ({ signal }) => {
                const response = await this.#fetch(url, { signal });
                if (!response.ok) {
                    throw new KeyFetchError(url, `${url} responded with HTTP ${response.status}`);
                }
                return await read(response);
            });
        } catch (err) {
            const error =
                err instanceof KeyFetchError
                    ? err
                    : err instanceof TaskCancelledError
                      ? new KeyFetchError(url, `Timed out after ${this.#fetchTimeoutMs}ms fetching ${url}`, { cause: err })
                      : new KeyFetchError(url, `Failed to fetch ${url}`, { cause: err });
            this.#logger.warn("key fetch failed", { url, error: error.message });
            throw error;
        }
    }
}
