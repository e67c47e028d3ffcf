/**
 * Authorization rules
 *
 * Rules are plain tagged values; an Authorizer combines an ordered list of
 * them with ALL or ANY semantics.
 *
 * @module authorizer
 */

import type { AuthorizableIdentity, AuthzRule, DomainRule, EmailRule, GroupRule } from "./types.ts";
import { AuthzMode, RuleType } from "./types.ts";

export function domainRule(allowed: Iterable<string>): DomainRule {
    return { type: RuleType.DOMAIN, allowed: new Set(allowed) };
}

export function groupRule(allowed: Iterable<string>): GroupRule {
    return { type: RuleType.GROUP, allowed: new Set(allowed) };
}

export function emailRule(allowed: Iterable<string>): EmailRule {
    return { type: RuleType.EMAIL, allowed: new Set(allowed) };
}

/**
 * Evaluate one rule. Comparisons are exact (case-sensitive).
 */
export function evaluateRule(rule: AuthzRule, identity: AuthorizableIdentity): boolean {
    switch (rule.type) {
        case RuleType.DOMAIN:
            return rule.allowed.has(identity.emailDomain);
        case RuleType.GROUP:
            return identity.groups.some((group) => rule.allowed.has(group));
        case RuleType.EMAIL:
            return rule.allowed.has(identity.email);
    }
}

/**
 * Outcome of {@link Authorizer.evaluate}.
 */
export interface AuthzEvaluation {
    readonly allowed: boolean;
    /** Per-rule outcomes in rule order; empty when no rule ran */
    readonly results: ReadonlyArray<{ readonly rule: AuthzRule; readonly passed: boolean }>;
}

/**
 * Options for {@link Authorizer.fromLists}.
 */
export interface AuthorizerListOptions {
    readonly allowedDomains?: Iterable<string> | undefined;
    readonly allowedGroups?: Iterable<string> | undefined;
    readonly allowedEmails?: Iterable<string> | undefined;
    /** Combine with ALL instead of ANY */
    readonly requireAll?: boolean | undefined;
}

/**
 * Decides whether an authenticated identity may proceed.
 *
 * - Unauthenticated (or absent) identities are refused without running any rule.
 * - No rules: every authenticated identity is allowed.
 * - Otherwise every rule is evaluated and the results are combined by `mode`.
 *
 * @example Company staff, or anyone in the "contractors" group
 * ```typescript
 * const authorizer = new Authorizer([domainRule(["example.com"]), groupRule(["contractors"])], AuthzMode.ANY);
 * authorizer.isAuthorized(identity);
 * ```
 */
export class Authorizer {
    readonly rules: ReadonlyArray<AuthzRule>;
    readonly mode: AuthzMode;

    constructor(rules: ReadonlyArray<AuthzRule> = [], mode: AuthzMode = AuthzMode.ANY) {
        this.rules = Object.freeze([...rules]);
        this.mode = mode;
    }

    /**
     * Build an authorizer with one rule per non-empty list, in the order
     * domains, groups, emails.
     */
    static fromLists(options: AuthorizerListOptions): Authorizer {
        const rules: AuthzRule[] = [];
        const domains = [...(options.allowedDomains ?? [])];
        const groups = [...(options.allowedGroups ?? [])];
        const emails = [...(options.allowedEmails ?? [])];

        if (domains.length > 0) rules.push(domainRule(domains));
        if (groups.length > 0) rules.push(groupRule(groups));
        if (emails.length > 0) rules.push(emailRule(emails));

        return new Authorizer(rules, options.requireAll ? AuthzMode.ALL : AuthzMode.ANY);
    }

    evaluate(identity: AuthorizableIdentity | undefined): AuthzEvaluation {
        if (!identity?.isAuthenticated) {
            return { allowed: false, results: [] };
        }
        if (this.rules.length === 0) {
            return { allowed: true, results: [] };
        }

        const results = this.rules.map((rule) => ({ rule, passed: evaluateRule(rule, identity) }));
        const allowed = this.mode === AuthzMode.ALL ? results.every((r) => r.passed) : results.some((r) => r.passed);
        return { allowed, results };
    }

    isAuthorized(identity: AuthorizableIdentity | undefined): boolean {
        return this.evaluate(identity).allowed;
    }
}
