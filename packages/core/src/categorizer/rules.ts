/**
 * Rule table helpers shared by the keyword matcher, the learner and the rule store.
 */

import { EXCLUSION_PREFIX } from '../types/index.js';
import type { MappingRule } from '../types/index.js';

export function isExclusionRule(rule: MappingRule): boolean {
    return rule.keyword.startsWith(EXCLUSION_PREFIX);
}

/**
 * Keyword of an exclusion rule without its "!" prefix.
 */
export function exclusionRoot(rule: MappingRule): string {
    return rule.keyword.slice(EXCLUSION_PREFIX.length).trim();
}

/**
 * Drop rules whose keyword already appeared earlier in the list.
 * First occurrence wins, order is preserved.
 */
export function dedupeRules(rules: readonly MappingRule[]): MappingRule[] {
    const seen = new Set<string>();
    const result: MappingRule[] = [];
    for (const rule of rules) {
        if (seen.has(rule.keyword)) continue;
        seen.add(rule.keyword);
        result.push(rule);
    }
    return result;
}

export function hasKeyword(rules: readonly MappingRule[], keyword: string): boolean {
    return rules.some((rule) => rule.keyword === keyword);
}
