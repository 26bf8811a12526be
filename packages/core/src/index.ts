// Types (re-exported from shared)
export type {
    Transaction,
    MappingRule,
    VendorMap,
    KeywordMatch,
    FuzzyMatch,
    RemoteMatch,
    NoMatch,
    MatchResult,
    MatchStrategy,
    CategorizedTransaction,
    CategorizerConfig,
    LearnerConfig,
    KeywordValidationResult,
    CollisionResult,
} from './types/index.js';

export {
    TransactionSchema,
    MappingRuleSchema,
    MatchResultSchema,
    CategorizerConfigSchema,
    DEFAULT_CONFIG,
    createConfig,
} from './types/index.js';

// Utils
export { normalizeText, normalizeVendorName, tokenize } from './utils/index.js';

// Categorizer
export {
    categorizeAll,
    arbitrate,
    chooseCategory,
    applyAgreementBoost,
    matchKeyword,
    matchFuzzyVendor,
    candidateWindows,
    vendorSimilarity,
    fuzzyConfidence,
    matchRemote,
    buildClassificationPrompt,
    buildTransactionContext,
    learnFromFeedback,
    extractVendorTokens,
    proposeRules,
    vendorKeys,
    buildVendorMap,
    validateKeyword,
    checkKeywordCollision,
    dedupeRules,
    isExclusionRule,
    exclusionRoot,
    hasKeyword,
} from './categorizer/index.js';

export type {
    CategorizeAllOptions,
    CategorizeAllResult,
    ArbitrationOptions,
    ArbitrationOutcome,
    RemoteClassifier,
    TransactionContext,
    RuleContext,
    RuleStore,
    LearnResult,
    ConfirmCategory,
    CategorizationStats,
} from './categorizer/index.js';
