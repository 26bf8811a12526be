/**
 * Zod schemas for spendsort data structures.
 *
 * Amounts are decimal strings, never native numbers. Convert to Decimal at
 * computation boundaries only.
 */

import { z } from 'zod';
import {
    ARBITRATION,
    CONFIDENCE,
    DEFAULT_STOP_WORDS,
    EXCLUSION_PREFIX,
    FUZZY,
    KEYWORD_VALIDATION,
    REMOTE_DEFAULTS,
} from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const probability = z.number().min(0).max(1);

// ============================================================================
// Transaction Schema
// ============================================================================

/**
 * Already-normalized transaction supplied by the import layer.
 * Read-only input to the categorizer.
 */
export const TransactionSchema = z.object({
    date: isoDateString,
    description: z.string(),
    amount: decimalString,
    category: z.string().min(1).optional(),
});

export type Transaction = z.infer<typeof TransactionSchema>;

// ============================================================================
// Rule Schemas
// ============================================================================

/**
 * Learned or manual keyword rule.
 * A keyword starting with "!" is an exclusion; its category is ignored.
 */
export const MappingRuleSchema = z
    .object({
        keyword: z.string().trim().toLowerCase().min(1),
        category: z.string().trim().default(''),
    })
    .refine(
        (rule) => rule.keyword.startsWith(EXCLUSION_PREFIX) || rule.category.length > 0,
        { message: 'Category is required unless the keyword is an exclusion', path: ['category'] }
    );

export type MappingRule = z.infer<typeof MappingRuleSchema>;

/**
 * Normalized vendor phrase -> category.
 * Insertion order decides fuzzy tie-breaks.
 */
export type VendorMap = ReadonlyMap<string, string>;

// ============================================================================
// Match Result Schemas
// ============================================================================

const matchPayload = {
    category: z.string().min(1).nullable(),
    confidence: probability,
    evidence: z.string().optional(),
    note: z.string(),
};

export const KeywordMatchSchema = z.object({
    strategy: z.literal('keyword'),
    excluded: z.boolean(),
    ...matchPayload,
});

export const FuzzyMatchSchema = z.object({
    strategy: z.literal('fuzzy'),
    ...matchPayload,
});

export const RemoteMatchSchema = z.object({
    strategy: z.literal('remote'),
    ...matchPayload,
});

export const NoMatchSchema = z.object({
    strategy: z.literal('none'),
    ...matchPayload,
});

/**
 * Result produced by every matcher and by the arbitration engine.
 */
export const MatchResultSchema = z.discriminatedUnion('strategy', [
    KeywordMatchSchema,
    FuzzyMatchSchema,
    RemoteMatchSchema,
    NoMatchSchema,
]);

export type KeywordMatch = Readonly<z.infer<typeof KeywordMatchSchema>>;
export type FuzzyMatch = Readonly<z.infer<typeof FuzzyMatchSchema>>;
export type RemoteMatch = Readonly<z.infer<typeof RemoteMatchSchema>>;
export type NoMatch = Readonly<z.infer<typeof NoMatchSchema>>;
export type MatchResult = KeywordMatch | FuzzyMatch | RemoteMatch | NoMatch;
export type MatchStrategy = MatchResult['strategy'];

/**
 * A transaction with the decision made for it.
 */
export interface CategorizedTransaction {
    transaction: Transaction;
    result: MatchResult;
    /** Category to apply: the decision, a manual confirmation, or the existing one. */
    category: string | null;
}

// ============================================================================
// Configuration Schemas
// ============================================================================

export const ConfidenceConfigSchema = z.object({
    keywordExact: probability.default(CONFIDENCE.KEYWORD_EXACT),
    keywordSubstring: probability.default(CONFIDENCE.KEYWORD_SUBSTRING),
    phraseBase: probability.default(CONFIDENCE.PHRASE_BASE),
    phraseStep: probability.default(CONFIDENCE.PHRASE_STEP),
    phraseMax: probability.default(CONFIDENCE.PHRASE_MAX),
    fuzzyMax: probability.default(CONFIDENCE.FUZZY_MAX),
    fuzzyStrongScore: z.number().min(0).max(100).default(FUZZY.STRONG_SCORE),
    fuzzyStrongMultiplier: z.number().min(1).default(FUZZY.STRONG_MULTIPLIER),
    fuzzyStrongMax: probability.default(CONFIDENCE.FUZZY_STRONG_MAX),
    remote: probability.default(CONFIDENCE.REMOTE),
});

export const LearnerConfigSchema = z.object({
    stopWords: z.array(z.string()).default([...DEFAULT_STOP_WORDS]),
    minTokenLength: z.number().int().min(1).default(3),
    maxVendorTokens: z.number().int().min(1).default(3),
    scanWords: z.number().int().min(1).default(5),
    minSingleKeywordLength: z.number().int().min(1).default(6),
});

export const RemoteConfigSchema = z.object({
    model: z.string().min(1).default(REMOTE_DEFAULTS.MODEL),
    maxTokens: z.number().int().positive().default(REMOTE_DEFAULTS.MAX_TOKENS),
    temperature: z.number().min(0).max(2).default(REMOTE_DEFAULTS.TEMPERATURE),
    timeoutMs: z.number().int().positive().default(REMOTE_DEFAULTS.TIMEOUT_MS),
    maxRetries: z.number().int().min(0).default(REMOTE_DEFAULTS.MAX_RETRIES),
});

/**
 * Categorizer configuration. Parsed once and passed to every matcher.
 */
export const CategorizerConfigSchema = z.object({
    fuzzyThreshold: z.number().min(0).max(100).default(FUZZY.THRESHOLD),
    minConfidence: probability.default(ARBITRATION.MIN_CONFIDENCE),
    agreementMultiplier: z.number().min(1).default(ARBITRATION.AGREEMENT_MULTIPLIER),
    agreementCap: probability.default(ARBITRATION.AGREEMENT_CAP),
    minSubstringKeywordLength: z.number().int().min(1).default(KEYWORD_VALIDATION.MIN_SUBSTRING_LENGTH),
    confidence: ConfidenceConfigSchema.default({}),
    learner: LearnerConfigSchema.default({}),
    remote: RemoteConfigSchema.default({}),
});

export type CategorizerConfigInput = z.input<typeof CategorizerConfigSchema>;
export type CategorizerConfig = Readonly<z.infer<typeof CategorizerConfigSchema>>;
export type LearnerConfig = Readonly<z.infer<typeof LearnerConfigSchema>>;
export type RemoteConfig = Readonly<z.infer<typeof RemoteConfigSchema>>;

/**
 * Freeze a parsed config together with its nested groups.
 */
export function freezeConfig(config: z.infer<typeof CategorizerConfigSchema>): CategorizerConfig {
    Object.freeze(config.confidence);
    Object.freeze(config.learner.stopWords);
    Object.freeze(config.learner);
    Object.freeze(config.remote);
    return Object.freeze(config);
}

/**
 * Build a frozen config from partial overrides.
 */
export function createConfig(overrides: CategorizerConfigInput = {}): CategorizerConfig {
    return freezeConfig(CategorizerConfigSchema.parse(overrides));
}

export const DEFAULT_CONFIG: CategorizerConfig = createConfig();

// ============================================================================
// Rule Validation Schemas
// ============================================================================

/**
 * Keyword validation result.
 */
export const KeywordValidationResultSchema = z.object({
    valid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
    matchCount: z.number().int().min(0).optional(),
    matchPercent: z.number().min(0).max(1).optional(),
});

export type KeywordValidationResult = z.infer<typeof KeywordValidationResultSchema>;

/**
 * Keyword collision check result.
 */
export const CollisionResultSchema = z.object({
    hasCollision: z.boolean(),
    collidingKeywords: z.array(z.string()),
});

export type CollisionResult = z.infer<typeof CollisionResultSchema>;

// ============================================================================
// Transaction Read Result
// ============================================================================

/**
 * Result of reading a transaction file. Warnings are returned as data.
 */
export const TransactionReadResultSchema = z.object({
    transactions: z.array(TransactionSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type TransactionReadResult = z.infer<typeof TransactionReadResultSchema>;
