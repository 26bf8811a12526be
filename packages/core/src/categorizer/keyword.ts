/**
 * Keyword tier: lookup of learned (keyword -> category) rules.
 *
 * Scoring:
 * - exclusion rule ("!root") whose root occurs in the description: no category, stop
 * - multi-word phrase contained in the description: phraseBase + phraseStep * words, capped
 * - single keyword equal to a description token: keywordExact
 * - single keyword contained in a longer token: keywordSubstring (long keywords only)
 *
 * ARCHITECTURAL NOTE: No console.* calls. Explanations go into the result note.
 */

import { normalizeText } from '../utils/normalize.js';
import { exclusionRoot, isExclusionRule } from './rules.js';
import type { CategorizerConfig, KeywordMatch, MappingRule } from '../types/index.js';

/**
 * Score a single non-exclusion rule against the lower-cased description.
 */
function scoreRule(
    keyword: string,
    descLower: string,
    descWords: ReadonlySet<string>,
    config: CategorizerConfig
): number {
    const { confidence } = config;

    if (keyword.includes(' ')) {
        if (!descLower.includes(keyword)) return 0;
        const wordCount = keyword.split(/\s+/).length;
        return Math.min(confidence.phraseBase + wordCount * confidence.phraseStep, confidence.phraseMax);
    }

    if (descWords.has(keyword)) {
        return confidence.keywordExact;
    }

    // Concatenated tokens, e.g. "paypal" inside "paypal*spotify"
    if (keyword.length >= config.minSubstringKeywordLength && descLower.includes(keyword)) {
        return confidence.keywordSubstring;
    }

    return 0;
}

/**
 * Match a raw description against the rule list.
 *
 * Exclusions override every other signal: the first exclusion whose root is a
 * substring of the description ends the lookup with `excluded: true`.
 * Among scoring rules the highest score wins; the earliest rule wins ties.
 *
 * @param description - Raw transaction description
 * @param rules - Current rule list snapshot
 * @param config - Categorizer configuration
 */
export function matchKeyword(
    description: string,
    rules: readonly MappingRule[],
    config: CategorizerConfig
): KeywordMatch {
    const descLower = normalizeText(description).toLowerCase();

    if (descLower === '') {
        return {
            strategy: 'keyword',
            excluded: false,
            category: null,
            confidence: 0,
            note: 'Empty description',
        };
    }

    for (const rule of rules) {
        if (!isExclusionRule(rule)) continue;
        const root = exclusionRoot(rule);
        if (root !== '' && descLower.includes(root)) {
            return {
                strategy: 'keyword',
                excluded: true,
                category: null,
                confidence: 0,
                evidence: rule.keyword,
                note: `Excluded by rule "${rule.keyword}"`,
            };
        }
    }

    const descWords = new Set(descLower.split(' '));
    let bestRule: MappingRule | null = null;
    let bestScore = 0;

    for (const rule of rules) {
        if (isExclusionRule(rule) || rule.keyword === '' || rule.category === '') continue;
        const score = scoreRule(rule.keyword, descLower, descWords, config);
        if (score > bestScore) {
            bestScore = score;
            bestRule = rule;
        }
    }

    if (bestRule) {
        return {
            strategy: 'keyword',
            excluded: false,
            category: bestRule.category,
            confidence: bestScore,
            evidence: bestRule.keyword,
            note: `Keyword match: ${bestRule.keyword} (confidence: ${bestScore.toFixed(2)})`,
        };
    }

    return {
        strategy: 'keyword',
        excluded: false,
        category: null,
        confidence: 0,
        note: 'No keyword matches found',
    };
}
