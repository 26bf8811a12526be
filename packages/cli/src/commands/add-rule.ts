import { MappingRuleSchema, validateKeyword, checkKeywordCollision } from '@spendsort/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadCategories, loadRules } from '../workspace/config.js';
import { YamlRuleStore } from '../yaml/rules.js';
import { success, log, arrow, warn, errorMessage } from '../utils/console.js';
import type { AddRuleOptions } from '../types.js';

/**
 * Add one keyword rule by hand. A keyword starting with "!" adds an exclusion
 * and needs no category.
 */
export async function addRule(keyword: string, category: string | undefined, options: AddRuleOptions): Promise<void> {
    const validation = validateKeyword(keyword);
    if (!validation.valid) {
        console.error(`\n✖ Error: ${validation.errors.join(', ')}`);
        process.exit(1);
    }

    const parsed = MappingRuleSchema.safeParse({ keyword, category: category ?? '' });
    if (!parsed.success) {
        console.error(`\n✖ Error: ${parsed.error.issues.map((issue) => issue.message).join(', ')}`);
        process.exit(1);
    }
    const rule = parsed.data;

    // 1. Workspace detection
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        console.error('\n✖ Error: Workspace not found.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    const rulesPath = workspace.config.rulesPath;

    // Unknown categories are allowed but flagged
    let categories: string[];
    try {
        categories = loadCategories(workspace);
    } catch (err) {
        console.error(`\n✖ Error loading categories: ${errorMessage(err)}`);
        process.exit(1);
    }
    if (rule.category !== '' && categories.length > 0 && !categories.includes(rule.category)) {
        warn(`Category "${rule.category}" is not listed in ${workspace.config.categoriesPath}.`);
    }

    // Collision handling: warn but don't block
    const { rules: existingRules } = await loadRules(workspace);
    if (existingRules.some((existing) => existing.keyword === rule.keyword)) {
        console.error(`\n✖ Error: A rule for "${rule.keyword}" already exists.`);
        process.exit(1);
    }

    const collision = checkKeywordCollision(rule.keyword, existingRules);
    if (collision.hasCollision) {
        warn(`Keyword overlap detected.`);
        log(`  Your keyword "${rule.keyword}" overlaps existing rule:`);
        log(`  "${collision.collidingKeywords[0]}"`);
        log(`  Proceeding anyway.\n`);
    }

    // 2. Perform addition
    log(`Adding new rule to: ${rulesPath}`);

    try {
        const store = new YamlRuleStore(rulesPath);
        await store.update((rules) => [...rules, rule]);

        success(`Rule successfully added!`);
        arrow(`Keyword:  "${rule.keyword}"`);
        if (rule.category !== '') {
            arrow(`Category: ${rule.category}`);
        } else {
            arrow('Excludes matching transactions');
        }
    } catch (err) {
        console.error(`\n✖ Failed to add rule: ${errorMessage(err)}`);
        process.exit(1);
    }
}
