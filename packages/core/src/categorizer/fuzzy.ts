/**
 * Fuzzy vendor tier: similarity search against the vendor map.
 *
 * Descriptions often carry a transaction-code prefix or a branch number
 * suffix ("4412 SUPER MARKET CHAIN #4521"), so several word windows of the
 * normalized description are compared instead of the whole string.
 */

import * as fuzz from 'fuzzball';
import { normalizeVendorName } from '../utils/normalize.js';
import type { CategorizerConfig, FuzzyMatch, VendorMap } from '../types/index.js';

/**
 * Word windows tried against the vendor map, in evaluation order.
 *
 * - first 2, first 3, first 4 words
 * - words 2-4 (skips a leading code token)
 * - the whole string when it has at most 3 words
 */
export function candidateWindows(normalized: string): string[] {
    const words = normalized === '' ? [] : normalized.split(' ');
    const candidates: string[] = [];

    if (words.length >= 2) candidates.push(words.slice(0, 2).join(' '));
    if (words.length >= 3) candidates.push(words.slice(0, 3).join(' '));
    if (words.length >= 4) {
        candidates.push(words.slice(0, 4).join(' '));
        candidates.push(words.slice(1, 4).join(' '));
    }
    if (words.length > 0 && words.length <= 3) candidates.push(normalized);

    return candidates;
}

/**
 * Token-set similarity on a 0-100 scale (order independent, subset tolerant).
 */
export function vendorSimilarity(candidate: string, vendor: string): number {
    return fuzz.token_set_ratio(candidate, vendor);
}

/**
 * Map a similarity score to a confidence.
 * Fuzzy matches stay below exact keyword hits unless the score is near perfect.
 */
export function fuzzyConfidence(score: number, config: CategorizerConfig): number {
    const { confidence } = config;
    let result = Math.min(score / 100, confidence.fuzzyMax);
    if (score >= confidence.fuzzyStrongScore) {
        result = Math.min(result * confidence.fuzzyStrongMultiplier, confidence.fuzzyStrongMax);
    }
    return result;
}

/**
 * Find the best vendor-map entry for a description.
 *
 * Only a strictly higher score replaces the current best, so earlier
 * windows and earlier vendor-map entries win ties.
 *
 * @param description - Raw transaction description
 * @param vendorMap - Vendor phrase -> category snapshot
 * @param config - Categorizer configuration (fuzzyThreshold is on a 0-100 scale)
 */
export function matchFuzzyVendor(
    description: string,
    vendorMap: VendorMap,
    config: CategorizerConfig
): FuzzyMatch {
    const threshold = config.fuzzyThreshold;

    if (vendorMap.size === 0) {
        return {
            strategy: 'fuzzy',
            category: null,
            confidence: 0,
            note: 'No vendor mappings available',
        };
    }

    const normalized = normalizeVendorName(description);
    let best: { vendor: string; window: string; score: number } | null = null;

    for (const window of candidateWindows(normalized)) {
        for (const vendor of vendorMap.keys()) {
            const score = vendorSimilarity(window, vendor);
            if (score < threshold) continue;
            if (best === null || score > best.score) {
                best = { vendor, window, score };
            }
        }
    }

    if (best !== null) {
        const category = vendorMap.get(best.vendor);
        if (category) {
            return {
                strategy: 'fuzzy',
                category,
                confidence: fuzzyConfidence(best.score, config),
                evidence: best.vendor,
                note: `Fuzzy match: '${best.vendor}' from '${best.window}' (score: ${best.score})`,
            };
        }
    }

    return {
        strategy: 'fuzzy',
        category: null,
        confidence: 0,
        note: `No fuzzy matches above threshold ${threshold}`,
    };
}
