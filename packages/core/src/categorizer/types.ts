/**
 * Internal types for categorizer module.
 */

import type { MappingRule, MatchResult, Transaction, VendorMap } from '../types/index.js';

/**
 * Read-only snapshot the matchers work against for one call.
 */
export interface RuleContext {
    rules: readonly MappingRule[];
    vendorMap: VendorMap;
    /** Closed category list for the remote tier. */
    categories: readonly string[];
}

/**
 * Durable rule table. Written wholesale on every learning event.
 */
export interface RuleStore {
    save(rules: readonly MappingRule[]): Promise<void>;
}

/**
 * Outcome of one feedback learning event.
 */
export interface LearnResult {
    rules: MappingRule[];
    vendorMap: Map<string, string>;
    /** Rules appended by this event (empty on a repeated confirmation). */
    added: MappingRule[];
}

/**
 * Asks for a category when arbitration found no confident one.
 * Resolves to null to leave the transaction uncategorized.
 */
export type ConfirmCategory = (transaction: Transaction, result: MatchResult) => Promise<string | null>;

/**
 * Statistics from batch categorization.
 */
export interface CategorizationStats {
    total: number;
    byStrategy: {
        keyword: number;
        fuzzy: number;
        remote: number;
        none: number;
    };
    skipped: number;
    confirmed: number;
    rulesLearned: number;
}
