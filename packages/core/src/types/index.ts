/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@spendsort/shared';

export {
    TransactionSchema,
    MappingRuleSchema,
    MatchResultSchema,
    CategorizerConfigSchema,
    DEFAULT_CONFIG,
    createConfig,
    EXCLUSION_PREFIX,
    LEGAL_ENTITY_SUFFIXES,
    KEYWORD_VALIDATION,
} from '@spendsort/shared';
