/**
 * Environment and file configuration validation with Zod
 *
 * Invalid configuration fails here, at startup, and never reaches a request.
 *
 * @module config
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { Authorizer, domainRule, emailRule, groupRule } from "./authorizer.ts";
import type { AuthzRule, GuardConfig } from "./types.ts";
import { AuthzMode, RuleType } from "./types.ts";

/**
 * Boolean from string schema (for ENV variables)
 */
export const BooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default("false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * Comma-separated list; surrounding whitespace and blank entries are dropped
 */
export const CsvListSchema = z
    .string()
    .default("")
    .transform((v) =>
        v
            .split(",")
            .map((item) => item.trim())
            .filter((item) => item.length > 0),
    );

/**
 * AWS region name, e.g. `eu-west-2` or `us-gov-west-1`
 */
export const RegionSchema = z.string().regex(/^[a-z]{2}(-[a-z]+)+-\d+$/, "Expected an AWS region such as eu-west-2");

/**
 * albgate environment configuration schema
 *
 * @example
 * ```typescript
 * const config = AlbGateEnvSchema.parse(process.env);
 * console.log(config.ALBGATE_KEY_CACHE_TTL_SECONDS); // 3600 (default)
 * ```
 */
export const AlbGateEnvSchema = z.object({
    /**
     * Region of the load balancer
     */
    AWS_REGION: RegionSchema,

    /**
     * Lifetime of a fetched identity-provider key set
     * @default 3600
     */
    ALBGATE_KEY_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),

    /**
     * Timeout for a single key fetch
     * @default 10000
     */
    ALBGATE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().max(60000).default(10000),

    ALBGATE_ALLOWED_DOMAINS: CsvListSchema,
    ALBGATE_ALLOWED_GROUPS: CsvListSchema,
    ALBGATE_ALLOWED_EMAILS: CsvListSchema,
    ALBGATE_TRUSTED_ISSUERS: CsvListSchema,

    /**
     * Combine the allow lists with ALL instead of ANY
     * @default false
     */
    ALBGATE_REQUIRE_ALL: BooleanFromStringSchema,

    /**
     * Where adapters send denied browser requests
     */
    ALBGATE_DENY_TARGET: z.string().url().optional(),

    /**
     * JSON rules file; replaces the ALLOWED_* lists when set
     */
    ALBGATE_RULES_FILE: z.string().min(1).optional(),
});

export type AlbGateEnv = z.infer<typeof AlbGateEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ AWS_REGION: "eu-west-2" });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): AlbGateEnv {
    return AlbGateEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 *
 * @example
 * ```typescript
 * const result = safeParseEnvConfig();
 * if (!result.success) {
 *   console.error(result.error.format());
 * }
 * ```
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return AlbGateEnvSchema.safeParse(env);
}

// ---------------------------------------------------------------------------
// Rules file
// ---------------------------------------------------------------------------

export const AuthzRuleSchema = z.object({
    type: z.enum([RuleType.DOMAIN, RuleType.GROUP, RuleType.EMAIL]),
    allowed: z.array(z.string().min(1)),
});

/**
 * Authorizer configuration document
 *
 * @example
 * ```json
 * { "mode": "all", "rules": [{ "type": "domain", "allowed": ["example.com"] }] }
 * ```
 */
export const AuthorizerConfigSchema = z.object({
    mode: z.enum([AuthzMode.ALL, AuthzMode.ANY]).default(AuthzMode.ANY),
    rules: z.array(AuthzRuleSchema).default([]),
});

export type AuthorizerConfig = z.infer<typeof AuthorizerConfigSchema>;

function toRule(rule: z.infer<typeof AuthzRuleSchema>): AuthzRule {
    switch (rule.type) {
        case RuleType.DOMAIN:
            return domainRule(rule.allowed);
        case RuleType.GROUP:
            return groupRule(rule.allowed);
        case RuleType.EMAIL:
            return emailRule(rule.allowed);
    }
}

/**
 * Build an Authorizer from an already parsed document.
 */
export function authorizerFromConfig(config: AuthorizerConfig): Authorizer {
    return new Authorizer(config.rules.map(toRule), config.mode);
}

/**
 * Read, validate and build an Authorizer from a JSON rules file.
 *
 * @throws SyntaxError when the file is not JSON
 * @throws ZodError when the document does not match {@link AuthorizerConfigSchema}
 */
export async function loadAuthorizerConfig(path: string): Promise<Authorizer> {
    const text = await readFile(path, "utf8");
    return authorizerFromConfig(AuthorizerConfigSchema.parse(JSON.parse(text)));
}

/**
 * Turn the environment into a guard configuration.
 *
 * Fetch, clock and logger are left to their defaults.
 */
export async function guardConfigFromEnv(env: Record<string, string | undefined> = process.env): Promise<GuardConfig> {
    const config = parseEnvConfig(env);

    const authorizer = config.ALBGATE_RULES_FILE
        ? await loadAuthorizerConfig(config.ALBGATE_RULES_FILE)
        : Authorizer.fromLists({
              allowedDomains: config.ALBGATE_ALLOWED_DOMAINS,
              allowedGroups: config.ALBGATE_ALLOWED_GROUPS,
              allowedEmails: config.ALBGATE_ALLOWED_EMAILS,
              requireAll: config.ALBGATE_REQUIRE_ALL,
          });

    return {
        region: config.AWS_REGION,
        cacheTtlSeconds: config.ALBGATE_KEY_CACHE_TTL_SECONDS,
        fetchTimeoutMs: config.ALBGATE_FETCH_TIMEOUT_MS,
        trustedIssuers: config.ALBGATE_TRUSTED_ISSUERS,
        denyTarget: config.ALBGATE_DENY_TARGET,
        rules: authorizer.rules,
        mode: authorizer.mode,
    };
}
