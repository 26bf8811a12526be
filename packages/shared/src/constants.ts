/**
 * Constants for spendsort.
 *
 * Confidence values are the defaults of CategorizerConfig; callers that need
 * different thresholds pass a parsed config instead of editing these.
 */

/**
 * Confidence scores per matching tier.
 */
export const CONFIDENCE = {
    KEYWORD_EXACT: 0.95,
    KEYWORD_SUBSTRING: 0.85,
    PHRASE_BASE: 0.95,
    PHRASE_STEP: 0.01,
    PHRASE_MAX: 0.98,
    FUZZY_MAX: 0.9,
    FUZZY_STRONG_MAX: 0.95,
    REMOTE: 0.75,
} as const;

/**
 * Ensemble arbitration settings.
 */
export const ARBITRATION = {
    MIN_CONFIDENCE: 0.7,
    AGREEMENT_MULTIPLIER: 1.2,
    AGREEMENT_CAP: 0.98,
} as const;

/**
 * Fuzzy vendor matching settings. Scores are on a 0-100 scale.
 */
export const FUZZY = {
    THRESHOLD: 86,
    STRONG_SCORE: 95,
    STRONG_MULTIPLIER: 1.05,
} as const;

/**
 * Keyword rule validation thresholds.
 */
export const KEYWORD_VALIDATION = {
    MIN_LENGTH: 3,
    MIN_SUBSTRING_LENGTH: 5,
    MAX_MATCH_PERCENT: 0.2,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;

/**
 * Prefix marking a rule keyword as an exclusion.
 */
export const EXCLUSION_PREFIX = '!';

/**
 * Legal-entity suffix tokens stripped from vendor names (Hebrew and English).
 */
export const LEGAL_ENTITY_SUFFIXES = [
    'בע"מ',
    'בעמ',
    "בע''מ",
    'בע״מ',
    'ltd',
    'inc',
    'llc',
    'corp',
    'limited',
    'corporation',
] as const;

/**
 * Words the feedback learner never turns into rules.
 */
export const DEFAULT_STOP_WORDS = [
    // Hebrew
    'של', 'את', 'על', 'עם', 'אל', 'מן', 'כי', 'אם', 'לא', 'או', 'גם', 'רק',
    // English
    'the', 'and', 'for', 'with', 'from',
    // Legal-entity suffixes
    ...LEGAL_ENTITY_SUFFIXES,
    'חפ', 'עמ', 'ושות',
    // Generic business words
    'company', 'group', 'international',
] as const;

/**
 * Remote classifier request defaults.
 */
export const REMOTE_DEFAULTS = {
    MODEL: 'gpt-4o-mini',
    MAX_TOKENS: 50,
    TEMPERATURE: 0.1,
    TIMEOUT_MS: 20_000,
    MAX_RETRIES: 1,
} as const;
