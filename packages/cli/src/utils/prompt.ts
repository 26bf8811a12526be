import { createInterface, type Interface } from 'node:readline';
import type { ConfirmCategory, MatchResult, Transaction } from '@spendsort/core';

function question(rl: Interface, message: string): Promise<string> {
    return new Promise((resolve) => {
        rl.question(message, resolve);
    });
}

/**
 * Resolve a typed answer against the category list.
 * A number picks from the list, an empty answer skips, anything else is taken verbatim.
 */
export function resolveAnswer(answer: string, categories: readonly string[]): string | null {
    const trimmed = answer.trim();
    if (trimmed === '') return null;
    if (/^\d+$/.test(trimmed)) {
        const picked = categories[parseInt(trimmed, 10) - 1];
        return picked ?? null;
    }
    return trimmed;
}

/**
 * Creates a confirmation hook that asks on the terminal for a category.
 * Returns undefined when stdin is not a TTY: nothing can be asked.
 */
export function createCategoryPrompt(categories: readonly string[]): { confirm: ConfirmCategory; close: () => void } | undefined {
    if (!process.stdin.isTTY) {
        console.error('Non-interactive terminal. Skipping confirmation prompts.');
        return undefined;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });

    const confirm: ConfirmCategory = async (transaction: Transaction, result: MatchResult) => {
        console.log('');
        console.log(`${transaction.date} | ${transaction.amount.padStart(10)} | ${transaction.description}`);
        console.log(`  ${result.note}`);
        categories.forEach((category, index) => {
            console.log(`  ${String(index + 1).padStart(2)}. ${category}`);
        });
        const answer = await question(rl, 'Category (number or name, Enter to skip): ');
        return resolveAnswer(answer, categories);
    };

    return { confirm, close: () => rl.close() };
}
