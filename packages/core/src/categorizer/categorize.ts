/**
 * Batch categorization.
 *
 * Transactions are processed strictly one after another: the remote tier
 * makes one network call per transaction, and a confirmation learned for one
 * transaction must be visible to the next.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Prompting and persistence are
 * injected by the caller.
 */

import { chooseCategory } from './arbitrate.js';
import { learnFromFeedback } from './learn.js';
import type { RemoteClassifier } from './remote.js';
import type { CategorizationStats, ConfirmCategory, RuleContext, RuleStore } from './types.js';
import type {
    CategorizedTransaction,
    CategorizerConfig,
    MappingRule,
    Transaction,
} from '../types/index.js';

/**
 * Options for categorizeAll().
 */
export interface CategorizeAllOptions {
    classifier?: RemoteClassifier;
    /** Skip transactions that already carry a category (default true). */
    onlyUncategorized?: boolean;
    /** Called for transactions left without any category after arbitration. */
    confirm?: ConfirmCategory;
    /** Receives learned rules; without it confirmations are applied but not learned. */
    store?: RuleStore;
}

export interface CategorizeAllResult {
    transactions: CategorizedTransaction[];
    /** Rule list after any learning during the batch. */
    rules: MappingRule[];
    /** Vendor map after any learning during the batch. */
    vendorMap: Map<string, string>;
    stats: CategorizationStats;
}

function emptyStats(total: number): CategorizationStats {
    return {
        total,
        byStrategy: {
            keyword: 0,
            fuzzy: 0,
            remote: 0,
            none: 0,
        },
        skipped: 0,
        confirmed: 0,
        rulesLearned: 0,
    };
}

/**
 * Categorize all transactions in a batch.
 *
 * @param transactions - Already-normalized transactions (never mutated)
 * @param ruleContext - Rule list, vendor map and category list at session start
 * @param config - Categorizer configuration
 * @param options - Remote classifier, confirmation hook and rule store
 * @returns Decisions per transaction, updated rule/vendor tables and stats
 */
export async function categorizeAll(
    transactions: readonly Transaction[],
    ruleContext: RuleContext,
    config: CategorizerConfig,
    options: CategorizeAllOptions = {}
): Promise<CategorizeAllResult> {
    const onlyUncategorized = options.onlyUncategorized ?? true;
    const stats = emptyStats(transactions.length);
    const categorized: CategorizedTransaction[] = [];

    let rules: MappingRule[] = [...ruleContext.rules];
    let vendorMap = new Map(ruleContext.vendorMap);

    for (const txn of transactions) {
        if (onlyUncategorized && txn.category) {
            stats.skipped++;
            categorized.push({
                transaction: txn,
                result: { strategy: 'none', category: null, confidence: 0, note: 'Already categorized' },
                category: txn.category,
            });
            continue;
        }

        let result = await chooseCategory(
            txn.description,
            { rules, vendorMap, categories: ruleContext.categories },
            config,
            { classifier: options.classifier, context: { amount: txn.amount, date: txn.date } }
        );
        stats.byStrategy[result.strategy]++;

        // An existing category survives a run where no tier is confident.
        let category = result.category ?? txn.category ?? null;

        if (category === null && options.confirm) {
            const answer = (await options.confirm(txn, result))?.trim();
            if (answer) {
                category = answer;
                result = { ...result, note: `${result.note}; confirmed manually as ${answer}` };
                stats.confirmed++;

                if (options.store) {
                    const learned = await learnFromFeedback(
                        txn.description,
                        answer,
                        { rules, vendorMap },
                        options.store,
                        config
                    );
                    rules = learned.rules;
                    vendorMap = learned.vendorMap;
                    stats.rulesLearned += learned.added.length;
                }
            }
        }

        categorized.push({ transaction: txn, result, category });
    }

    return { transactions: categorized, rules, vendorMap, stats };
}
