// Schemas
export {
    TransactionSchema,
    MappingRuleSchema,
    KeywordMatchSchema,
    FuzzyMatchSchema,
    RemoteMatchSchema,
    NoMatchSchema,
    MatchResultSchema,
    ConfidenceConfigSchema,
    LearnerConfigSchema,
    RemoteConfigSchema,
    CategorizerConfigSchema,
    KeywordValidationResultSchema,
    CollisionResultSchema,
    TransactionReadResultSchema,
    createConfig,
    freezeConfig,
    DEFAULT_CONFIG,
} from './schemas.js';

// Types
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
    CategorizerConfigInput,
    CategorizerConfig,
    LearnerConfig,
    RemoteConfig,
    KeywordValidationResult,
    CollisionResult,
    TransactionReadResult,
} from './schemas.js';

// Constants
export {
    CONFIDENCE,
    ARBITRATION,
    FUZZY,
    KEYWORD_VALIDATION,
    EXCLUSION_PREFIX,
    LEGAL_ENTITY_SUFFIXES,
    DEFAULT_STOP_WORDS,
    REMOTE_DEFAULTS,
} from './constants.js';
