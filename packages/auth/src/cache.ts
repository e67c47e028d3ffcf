/**
 * Minimal in-memory TTL cache with single-flight population.
 *
 * Entries leave the cache only by expiring. Concurrent misses on one key
 * share a single load; a failed load is not cached.
 */

import type { Clock } from "./types.ts";

interface CacheEntry<T> {
    value: T;
    expiresAt: number;
}

export class TtlCache<T> {
    readonly #ttl: number;
    readonly #now: Clock;
    readonly #entries = new Map<string, CacheEntry<T>>();
    readonly #pending = new Map<string, Promise<T>>();

    /**
     * @param options.ttl - Entry lifetime in milliseconds; `Infinity` keeps entries forever
     * @param options.now - Clock, defaults to Date.now
     */
    constructor(options: { ttl: number; now?: Clock | undefined }) {
        if (typeof options.ttl !== "number" || Number.isNaN(options.ttl) || options.ttl <= 0) {
            throw new RangeError("ttl must be a positive number");
        }
        this.#ttl = options.ttl;
        this.#now = options.now ?? Date.now;
    }

    get(key: string): T | undefined {
        const entry = this.#entries.get(key);
        if (!entry) return undefined;

        if (this.#now() >= entry.expiresAt) {
            this.#entries.delete(key);
            return undefined;
        }

        return entry.value;
    }

    /**
     * Return the cached value, or run `load` once for all concurrent callers
     * and cache its result.
     */
    async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
        const cached = this.get(key);
        if (cached !== undefined) return cached;

        const pending = this.#pending.get(key);
        if (pending) return await pending;

        // Deferred so the pending entry is registered before load() can settle
        const promise = Promise.resolve()
            .then(load)
            .then((value) => {
                this.#entries.set(key, { value, expiresAt: this.#now() + this.#ttl });
                return value;
            })
            .finally(() => {
                this.#pending.delete(key);
            });
        this.#pending.set(key, promise);
        return await promise;
    }

    get size(): number {
        return this.#entries.size;
    }

    /** Number of loads currently in flight */
    get pendingCount(): number {
        return this.#pending.size;
    }
}
