/**
 * Remote classifier tier.
 *
 * The core only knows the RemoteClassifier port; the CLI supplies a concrete
 * client. Every failure of the remote call becomes a zero-confidence result so
 * one outage never aborts a batch.
 */

import Decimal from 'decimal.js';
import type { CategorizerConfig, RemoteMatch } from '../types/index.js';

/**
 * Hosted text-completion service constrained to a closed category list.
 */
export interface RemoteClassifier {
    /**
     * @param context - Transaction context built by buildTransactionContext
     * @param categories - Closed list the answer must come from
     * @returns The raw answer of the service
     */
    classify(context: string, categories: readonly string[]): Promise<string>;
}

/**
 * Optional amount/date context passed along with the description.
 */
export interface TransactionContext {
    amount?: string | number;
    date?: string;
}

export function buildTransactionContext(description: string, context: TransactionContext = {}): string {
    const lines = [`Transaction: ${description}`];
    if (context.amount !== undefined && context.amount !== '') {
        lines.push(`Amount: ${formatAmount(context.amount)}`);
    }
    if (context.date) {
        lines.push(`Date: ${context.date}`);
    }
    return lines.join('\n');
}

function formatAmount(amount: string | number): string {
    try {
        return new Decimal(amount).toFixed(2);
    } catch {
        return String(amount);
    }
}

/**
 * Prompt asking for exactly one label from the list.
 * Labels are passed through unmodified, Hebrew included.
 */
export function buildClassificationPrompt(context: string, categories: readonly string[]): string {
    return [
        'You are a financial transaction categorization expert.',
        '',
        context,
        '',
        `Available categories: ${categories.join(', ')}`,
        '',
        'Instructions:',
        '1. Analyze the transaction description carefully',
        '2. Consider the merchant name, transaction type, and any provided context',
        '3. Return EXACTLY ONE category name from the list above',
        '4. If categories are in Hebrew, return the Hebrew name exactly as shown',
        '5. Return ONLY the category name, nothing else',
        '',
        'Category:',
    ].join('\n');
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Ask the remote classifier for a category.
 *
 * - no classifier configured: `note: 'no credential'`
 * - answer not exactly one of `categories`: rejected, never coerced
 * - thrown error: caught, reported in the note
 *
 * A valid answer gets the flat `config.confidence.remote` score since the
 * service reports no calibrated certainty.
 */
export async function matchRemote(
    description: string,
    categories: readonly string[],
    classifier: RemoteClassifier | undefined,
    config: CategorizerConfig,
    context: TransactionContext = {}
): Promise<RemoteMatch> {
    if (!classifier) {
        return { strategy: 'remote', category: null, confidence: 0, note: 'no credential' };
    }

    if (categories.length === 0) {
        return { strategy: 'remote', category: null, confidence: 0, note: 'No categories to choose from' };
    }

    if (description.trim() === '') {
        return { strategy: 'remote', category: null, confidence: 0, note: 'Empty description' };
    }

    let answer: string;
    try {
        answer = await classifier.classify(buildTransactionContext(description, context), categories);
    } catch (err) {
        return {
            strategy: 'remote',
            category: null,
            confidence: 0,
            note: `remote classifier failed: ${errorMessage(err)}`,
        };
    }

    const suggested = answer.trim();
    if (suggested !== '' && categories.includes(suggested)) {
        return {
            strategy: 'remote',
            category: suggested,
            confidence: config.confidence.remote,
            evidence: suggested,
            note: `Remote suggestion: ${suggested}`,
        };
    }

    return {
        strategy: 'remote',
        category: null,
        confidence: 0,
        note: `Remote classifier returned invalid category: ${suggested}`,
    };
}
