/**
 * Token header extraction
 *
 * @module headers
 */

import type { HeaderSource, RawTokenPair } from "./types.ts";
import { TOKEN_HEADERS } from "./types.ts";

/**
 * Read one header case-insensitively.
 *
 * Record sources may use any key case; array values yield their first
 * element. Empty values read as absent.
 */
export function readHeader(headers: HeaderSource, name: string): string | undefined {
    const wanted = name.toLowerCase();

    if (headers instanceof Headers) {
        return headers.get(wanted) || undefined;
    }

    for (const [key, value] of Object.entries(headers)) {
        if (key.toLowerCase() !== wanted) continue;
        const first = typeof value === "string" ? value : value?.[0];
        if (first) return first;
    }
    return undefined;
}

/**
 * Pull the two load balancer tokens out of the request headers.
 *
 * Absent tokens are left out; presence is enforced by the identity builder.
 *
 * @example
 * ```typescript
 * const tokens = extractTokenPair(req.headers);
 * if (tokens.identityToken && tokens.accessToken) { ... }
 * ```
 */
export function extractTokenPair(headers: HeaderSource): Partial<RawTokenPair> {
    const identityToken = readHeader(headers, TOKEN_HEADERS.IDENTITY);
    const accessToken = readHeader(headers, TOKEN_HEADERS.ACCESS);
    return {
        ...(identityToken ? { identityToken } : {}),
        ...(accessToken ? { accessToken } : {}),
    };
}
