import { learnFromFeedback } from '@spendsort/core';
import type { CategorizerConfig, MappingRule } from '@spendsort/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadSettings } from '../workspace/config.js';
import { YamlRuleStore } from '../yaml/rules.js';
import { success, log, arrow, warn, errorMessage } from '../utils/console.js';
import type { LearnOptions } from '../types.js';

/**
 * Learn keyword rules from one confirmed (description, category) pair.
 */
export async function learn(description: string, category: string, options: LearnOptions): Promise<void> {
    if (category.trim() === '') {
        console.error('\n✖ Error: Category cannot be empty.');
        process.exit(1);
    }

    // 1. Workspace detection
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        console.error('\n✖ Error: Workspace not found.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);

    let config: CategorizerConfig;
    try {
        config = loadSettings(workspace);
    } catch (err) {
        console.error(`\n✖ Error: ${errorMessage(err)}`);
        process.exit(1);
    }

    const store = new YamlRuleStore(workspace.config.rulesPath);
    const loaded = await store.load();
    for (const w of loaded.warnings) {
        warn(w);
    }

    // 2. Learn and persist
    let added: MappingRule[];
    try {
        const learned = await learnFromFeedback(
            description,
            category,
            { rules: loaded.rules, vendorMap: new Map() },
            store,
            config
        );
        added = learned.added;
    } catch (err) {
        console.error(`\n✖ Failed to learn rule: ${errorMessage(err)}`);
        process.exit(1);
    }

    if (added.length === 0) {
        log('No new rules: the description is already covered or has no usable vendor words.');
        return;
    }

    success(`Learned ${added.length} rule${added.length === 1 ? '' : 's'} for "${category.trim()}"`);
    for (const rule of added) {
        arrow(`"${rule.keyword}" → ${rule.category}`);
    }
}
