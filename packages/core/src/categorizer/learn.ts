/**
 * Feedback learner: turns a confirmed (description, category) pair into
 * keyword rules and vendor-map entries.
 *
 * Growth per correction is bounded: at most one 2-word phrase, one 3-word
 * phrase and one single-token rule. Every rule is checked for membership
 * before insert, so repeating a confirmation adds nothing.
 */

import { normalizeVendorName, tokenize } from '../utils/normalize.js';
import { dedupeRules, hasKeyword } from './rules.js';
import type { LearnResult, RuleStore } from './types.js';
import type { CategorizerConfig, LearnerConfig, MappingRule, VendorMap } from '../types/index.js';

const EDGE_PUNCTUATION = /^[.,;:!?()[\]{}"'-]+|[.,;:!?()[\]{}"'-]+$/g;

/**
 * Meaningful leading tokens of a description, in original order.
 *
 * Only the first `scanWords` words are examined. Tokens shorter than
 * `minTokenLength` and stop words are dropped; at most `maxVendorTokens` are kept.
 */
export function extractVendorTokens(description: string, learner: LearnerConfig): string[] {
    const stopWords = new Set(learner.stopWords.map((word) => word.toLowerCase()));
    const tokens: string[] = [];

    for (const word of tokenize(description).slice(0, learner.scanWords)) {
        const clean = word.replace(EDGE_PUNCTUATION, '');
        if (clean.length < learner.minTokenLength || stopWords.has(clean)) continue;
        tokens.push(clean);
        if (tokens.length >= learner.maxVendorTokens) break;
    }

    return tokens;
}

/**
 * Rules a confirmation would add, given the current list.
 */
export function proposeRules(
    tokens: readonly string[],
    category: string,
    rules: readonly MappingRule[],
    learner: LearnerConfig
): MappingRule[] {
    const proposed: MappingRule[] = [];
    const add = (keyword: string): void => {
        if (hasKeyword(rules, keyword) || hasKeyword(proposed, keyword)) return;
        proposed.push({ keyword, category });
    };

    // Phrases first: more specific than single words
    if (tokens.length >= 2) add(tokens.slice(0, 2).join(' '));
    if (tokens.length >= 3) add(tokens.slice(0, 3).join(' '));

    const distinctive = tokens.find((token) => token.length >= learner.minSingleKeywordLength);
    if (distinctive !== undefined) add(distinctive);

    return proposed;
}

/**
 * Vendor-map entries for a confirmation: the first three words as written
 * (lower-cased) and their normalized form.
 */
export function vendorKeys(description: string): string[] {
    const rawKey = tokenize(description).slice(0, 3).join(' ');
    const normalizedKey = normalizeVendorName(rawKey);
    const keys: string[] = [];
    if (rawKey !== '') keys.push(rawKey);
    if (normalizedKey !== '' && normalizedKey !== rawKey) keys.push(normalizedKey);
    return keys;
}

/**
 * Learn from a confirmed correction and persist the rule list.
 *
 * The rule store write is the one failure that propagates: dropping a user
 * correction silently would lose it.
 *
 * @param description - Description the user categorized
 * @param category - Confirmed category
 * @param current - Current rule list and vendor map (not mutated)
 * @param store - Rule store receiving the deduplicated list
 * @param config - Categorizer configuration
 * @throws Error when the category is empty or the store write fails
 */
export async function learnFromFeedback(
    description: string,
    category: string,
    current: { rules: readonly MappingRule[]; vendorMap: VendorMap },
    store: RuleStore,
    config: CategorizerConfig
): Promise<LearnResult> {
    const confirmed = category.trim();
    if (confirmed === '') {
        throw new Error('Cannot learn an empty category');
    }

    const tokens = extractVendorTokens(description, config.learner);
    const added = proposeRules(tokens, confirmed, current.rules, config.learner);
    const rules = dedupeRules([...current.rules, ...added]);

    const vendorMap = new Map(current.vendorMap);
    for (const key of vendorKeys(description)) {
        vendorMap.set(key, confirmed);
    }

    await store.save(rules);

    return { rules, vendorMap, added };
}
