/**
 * Arbitration engine: runs the matching tiers and settles on one decision.
 *
 * Order of evaluation (also the tie-break order):
 * 1. keyword rules
 * 2. fuzzy vendor map
 * 3. remote classifier (only when one is configured)
 *
 * Results proposing the same category from >=2 tiers are boosted, then the
 * highest confidence wins. A winner below config.minConfidence is replaced by
 * an explicit "none" decision instead of a low-confidence guess.
 *
 * ARCHITECTURAL NOTE: No console.* calls.
 */

import { matchKeyword } from './keyword.js';
import { matchFuzzyVendor } from './fuzzy.js';
import { matchRemote } from './remote.js';
import type { RemoteClassifier, TransactionContext } from './remote.js';
import type { RuleContext } from './types.js';
import type { CategorizerConfig, MatchResult, NoMatch } from '../types/index.js';

export interface ArbitrationOptions {
    /** Remote tier runs only when a classifier is given. */
    classifier?: RemoteClassifier;
    context?: TransactionContext;
}

export interface ArbitrationOutcome {
    result: MatchResult;
    /** Tier results after the agreement boost, in evaluation order. */
    tiers: MatchResult[];
}

function noMatch(note: string, evidence?: string): NoMatch {
    return evidence === undefined
        ? { strategy: 'none', category: null, confidence: 0, note }
        : { strategy: 'none', category: null, confidence: 0, evidence, note };
}

/**
 * Boost every result whose category is proposed by at least two tiers.
 * Returns new result objects; the inputs are left untouched.
 */
export function applyAgreementBoost(results: readonly MatchResult[], config: CategorizerConfig): MatchResult[] {
    const counts = new Map<string, number>();
    for (const result of results) {
        if (result.category !== null) {
            counts.set(result.category, (counts.get(result.category) ?? 0) + 1);
        }
    }

    const agreed = new Set<string>();
    for (const [category, count] of counts) {
        if (count >= 2) agreed.add(category);
    }
    if (agreed.size === 0) return [...results];

    return results.map((result) => {
        if (result.category === null || !agreed.has(result.category)) return result;
        return {
            ...result,
            confidence: Math.min(result.confidence * config.agreementMultiplier, config.agreementCap),
            note: `${result.note}; boosted by agreement`,
        };
    });
}

/**
 * Highest confidence wins; the earlier result wins ties.
 */
function pickBest(results: readonly MatchResult[]): MatchResult | null {
    let best: MatchResult | null = null;
    for (const result of results) {
        if (best === null || result.confidence > best.confidence) {
            best = result;
        }
    }
    return best;
}

/**
 * Run all tiers for one description and return the decision with the tier results.
 */
export async function arbitrate(
    description: string,
    ruleContext: RuleContext,
    config: CategorizerConfig,
    options: ArbitrationOptions = {}
): Promise<ArbitrationOutcome> {
    const keyword = matchKeyword(description, ruleContext.rules, config);

    // Exclusions override every other signal; the remote call is not spent.
    if (keyword.excluded) {
        return { result: noMatch(keyword.note, keyword.evidence), tiers: [keyword] };
    }

    const results: MatchResult[] = [keyword, matchFuzzyVendor(description, ruleContext.vendorMap, config)];
    if (options.classifier) {
        results.push(
            await matchRemote(description, ruleContext.categories, options.classifier, config, options.context)
        );
    }

    const tiers = applyAgreementBoost(results, config);
    const best = pickBest(tiers);

    if (best === null || best.category === null || best.confidence < config.minConfidence) {
        return {
            result: noMatch(
                `No high-confidence match found (all strategies below ${config.minConfidence.toFixed(2)} threshold)`
            ),
            tiers,
        };
    }

    return { result: best, tiers };
}

/**
 * Choose a category for one description.
 *
 * @param description - Raw transaction description
 * @param ruleContext - Rule list, vendor map and category list snapshot
 * @param config - Categorizer configuration
 * @param options - Remote classifier and amount/date context
 * @returns One MatchResult; strategy 'none' when no tier is confident enough
 */
export async function chooseCategory(
    description: string,
    ruleContext: RuleContext,
    config: CategorizerConfig,
    options: ArbitrationOptions = {}
): Promise<MatchResult> {
    const { result } = await arbitrate(description, ruleContext, config, options);
    return result;
}
