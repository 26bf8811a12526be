import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
    buildVendorMap,
    categorizeAll,
    type CategorizeAllResult,
    type CategorizerConfig,
    type Transaction,
} from '@spendsort/core';
import type { TransactionReadResult } from '@spendsort/shared';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace, getOutputPath } from '../workspace/paths.js';
import { loadCategories, loadRules, loadSettings } from '../workspace/config.js';
import { readTransactionsFile } from '../io/transactions.js';
import { YamlRuleStore } from '../yaml/rules.js';
import { createRemoteClassifier } from '../remote/openai.js';
import { generateCategorizedExcel } from '../excel/review.js';
import { createCategoryPrompt } from '../utils/prompt.js';
import { log, success, warn, arrow, info, errorMessage } from '../utils/console.js';
import type { CategorizeOptions } from '../types.js';

/**
 * Closed category list: configured names first, then names seen in rules and
 * in the file's already-categorized rows.
 */
export function collectCategories(
    configured: readonly string[],
    ruleCategories: readonly string[],
    transactions: readonly Transaction[]
): string[] {
    const names = [...configured, ...ruleCategories, ...transactions.map((t) => t.category ?? '')];
    return [...new Set(names.map((name) => name.trim()).filter((name) => name !== ''))];
}

export async function categorizeFile(inputPath: string, options: CategorizeOptions): Promise<void> {
    log(`\nspendsort - Categorizing ${inputPath}`);

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        console.error('\n✖ Error: Workspace not found.');
        console.error('Expected "config/rules.yaml" in the workspace root.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    success(`Workspace: ${workspace.root}`);

    // 2. Settings, rules, categories
    let config: CategorizerConfig;
    let categories: string[];
    try {
        config = loadSettings(workspace);
        categories = loadCategories(workspace);
    } catch (err) {
        console.error(`\n✖ Error: ${errorMessage(err)}`);
        process.exit(1);
    }

    const store = new YamlRuleStore(workspace.config.rulesPath);
    const loaded = await store.load();
    for (const w of loaded.warnings) {
        warn(w);
    }
    arrow(`Rules: ${loaded.rules.length}`);

    // 3. Transactions
    let read: TransactionReadResult;
    try {
        read = await readTransactionsFile(inputPath);
    } catch (err) {
        console.error(`\n✖ Error reading ${inputPath}: ${errorMessage(err)}`);
        process.exit(1);
    }
    for (const w of read.warnings) {
        warn(w);
    }
    arrow(`Transactions: ${read.transactions.length}`);

    const vendorMap = buildVendorMap(read.transactions);
    const allCategories = collectCategories(
        categories,
        loaded.rules.map((rule) => rule.category),
        read.transactions
    );

    const classifier = createRemoteClassifier(config.remote);
    if (!classifier) {
        info('OPENAI_API_KEY not set: remote classifier disabled.');
    }

    // 4. Categorize
    const prompt = options.interactive ? createCategoryPrompt(allCategories) : undefined;
    let result: CategorizeAllResult;
    try {
        result = await categorizeAll(
            read.transactions,
            { rules: loaded.rules, vendorMap, categories: allCategories },
            config,
            {
                classifier,
                onlyUncategorized: !options.all,
                confirm: prompt?.confirm,
                store: options.dryRun ? undefined : store,
            }
        );
    } catch (err) {
        console.error(`\n✖ Error: Categorization stopped: ${errorMessage(err)}`);
        process.exit(1);
    } finally {
        prompt?.close();
    }

    // 5. Report
    const { stats } = result;
    log('\n--- Categorization Summary ---');
    arrow(`Total:     ${stats.total}`);
    arrow(`Keyword:   ${stats.byStrategy.keyword}`);
    arrow(`Fuzzy:     ${stats.byStrategy.fuzzy}`);
    arrow(`Remote:    ${stats.byStrategy.remote}`);
    arrow(`No match:  ${stats.byStrategy.none}`);
    arrow(`Skipped:   ${stats.skipped}`);
    if (options.interactive) {
        arrow(`Confirmed: ${stats.confirmed}`);
        arrow(`Learned:   ${stats.rulesLearned} rules`);
    }

    if (options.dryRun) {
        log('\n[DRY RUN] No files were written.');
        return;
    }

    const outputPath = getOutputPath(workspace, inputPath);
    try {
        await mkdir(dirname(outputPath), { recursive: true });
        const workbook = await generateCategorizedExcel(result.transactions, stats);
        await workbook.xlsx.writeFile(outputPath);
    } catch (err) {
        console.error(`\n✖ Error writing ${outputPath}: ${errorMessage(err)}`);
        process.exit(1);
    }
    success(`Output saved to: ${outputPath}`);
}
