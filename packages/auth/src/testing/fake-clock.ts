/**
 * Controllable clock
 *
 * @module testing/fake-clock
 */

import type { Clock } from "../types.ts";

export interface FakeClock {
    /** Pass wherever a Clock is accepted */
    readonly now: Clock;
    /** Current reading in whole seconds, as used by `exp` */
    seconds(): number;
    set(ms: number): void;
    advance(ms: number): void;
}

/** 2024-01-01T00:00:00Z */
export const DEFAULT_START = 1_704_067_200_000;

/**
 * Create a clock that only moves when told to.
 *
 * @example
 * ```typescript
 * const clock = createFakeClock();
 * const cache = new KeyCache({ now: clock.now, ttlSeconds: 60 });
 * clock.advance(60_000);
 * ```
 */
export function createFakeClock(start: number = DEFAULT_START): FakeClock {
    let current = start;
    return {
        now: () => current,
        seconds: () => Math.floor(current / 1000),
        set(ms) {
            current = ms;
        },
        advance(ms) {
            current += ms;
        },
    };
}
