/**
 * Keyword validation for manually added rules.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { matchKeyword } from './keyword.js';
import { exclusionRoot, isExclusionRule } from './rules.js';
import { DEFAULT_CONFIG, EXCLUSION_PREFIX, KEYWORD_VALIDATION } from '../types/index.js';
import type { CollisionResult, KeywordValidationResult, MappingRule, Transaction } from '../types/index.js';

/**
 * Placeholder category so the breadth check can score a rule without one.
 */
const CANDIDATE_CATEGORY = '__candidate__';

function keywordRoot(keyword: string): string {
    const normalized = keyword.trim().toLowerCase();
    return normalized.startsWith(EXCLUSION_PREFIX) ? normalized.slice(EXCLUSION_PREFIX.length).trim() : normalized;
}

/**
 * Validate a keyword before adding it as a rule.
 *
 * - empty keyword, or "!" with nothing after it: rejected
 * - root shorter than KEYWORD_VALIDATION.MIN_LENGTH: rejected
 * - matches >20% AND >3 of the given transactions: warning (too broad)
 *
 * @param keyword - Keyword as typed, "!" prefix marks an exclusion
 * @param transactions - Optional transaction list for the breadth check
 */
export function validateKeyword(keyword: string, transactions?: readonly Transaction[]): KeywordValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const normalized = keyword.trim().toLowerCase();

    if (normalized === '') {
        errors.push('Keyword cannot be empty');
        return { valid: false, errors, warnings };
    }

    const root = keywordRoot(normalized);
    if (root === '') {
        errors.push(`Exclusion keyword needs text after "${EXCLUSION_PREFIX}"`);
        return { valid: false, errors, warnings };
    }

    if (root.length < KEYWORD_VALIDATION.MIN_LENGTH) {
        errors.push(
            `Keyword must be at least ${KEYWORD_VALIDATION.MIN_LENGTH} characters (got ${root.length})`
        );
        return { valid: false, errors, warnings };
    }

    if (!transactions || transactions.length === 0) {
        return { valid: true, errors, warnings };
    }

    const rule: MappingRule = { keyword: normalized, category: CANDIDATE_CATEGORY };
    let matchCount = 0;

    for (const txn of transactions) {
        const result = matchKeyword(txn.description, [rule], DEFAULT_CONFIG);
        if (isExclusionRule(rule) ? result.excluded : result.confidence > 0) {
            matchCount++;
        }
    }

    const matchPercent = matchCount / transactions.length;

    if (
        matchPercent > KEYWORD_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > KEYWORD_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Keyword "${normalized}" is too broad: matches ${matchCount} transactions ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${KEYWORD_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return { valid: true, errors, warnings, matchCount, matchPercent };
}

/**
 * Check if a new keyword overlaps existing rules.
 * Overlap means one root contains the other.
 *
 * @param keyword - New keyword
 * @param existingRules - Existing rules to check against
 */
export function checkKeywordCollision(keyword: string, existingRules: readonly MappingRule[]): CollisionResult {
    const collidingKeywords: string[] = [];
    const newRoot = keywordRoot(keyword);
    if (newRoot === '') {
        return { hasCollision: false, collidingKeywords };
    }

    for (const rule of existingRules) {
        const existingRoot = isExclusionRule(rule) ? exclusionRoot(rule) : rule.keyword;
        if (existingRoot === '') continue;
        if (newRoot.includes(existingRoot) || existingRoot.includes(newRoot)) {
            if (!collidingKeywords.includes(rule.keyword)) {
                collidingKeywords.push(rule.keyword);
            }
        }
    }

    return {
        hasCollision: collidingKeywords.length > 0,
        collidingKeywords,
    };
}
