/**
 * Categorizer module: ensemble transaction categorization.
 */

export { categorizeAll } from './categorize.js';
export { arbitrate, chooseCategory, applyAgreementBoost } from './arbitrate.js';
export { matchKeyword } from './keyword.js';
export { matchFuzzyVendor, candidateWindows, vendorSimilarity, fuzzyConfidence } from './fuzzy.js';
export { matchRemote, buildClassificationPrompt, buildTransactionContext } from './remote.js';
export { learnFromFeedback, extractVendorTokens, proposeRules, vendorKeys } from './learn.js';
export { buildVendorMap } from './vendor-map.js';
export { validateKeyword, checkKeywordCollision } from './validate.js';
export { dedupeRules, isExclusionRule, exclusionRoot, hasKeyword } from './rules.js';
export type { CategorizeAllOptions, CategorizeAllResult } from './categorize.js';
export type { ArbitrationOptions, ArbitrationOutcome } from './arbitrate.js';
export type { RemoteClassifier, TransactionContext } from './remote.js';
export type {
    RuleContext,
    RuleStore,
    LearnResult,
    ConfirmCategory,
    CategorizationStats,
} from './types.js';
