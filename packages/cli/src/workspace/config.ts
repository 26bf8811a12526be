import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { CategorizerConfigSchema, DEFAULT_CONFIG, freezeConfig, type CategorizerConfig } from '@spendsort/shared';
import { readRulesFile, type RulesLoadResult } from '../yaml/rules.js';
import type { Workspace } from '../types.js';

const CategoryListSchema = z.union([
    z.array(z.string().trim().min(1)),
    z.object({ categories: z.array(z.string().trim().min(1)).nullish() }),
]);

/**
 * Loads keyword rules (config/rules.yaml).
 * A missing file, corrupt YAML or invalid entries never abort: they come back as warnings.
 */
export function loadRules(workspace: Workspace): Promise<RulesLoadResult> {
    return readRulesFile(workspace.config.rulesPath);
}

/**
 * Loads the closed category list (config/categories.yaml).
 * Supports either a direct list or { categories: [...] }. Missing file → empty list.
 */
export function loadCategories(workspace: Workspace): string[] {
    const path = workspace.config.categoriesPath;
    if (!existsSync(path)) {
        return [];
    }
    const data: unknown = parse(readFileSync(path, 'utf-8'));
    if (data === null || data === undefined) return [];

    const parsed = CategoryListSchema.safeParse(data);
    if (!parsed.success) {
        throw new Error(`Invalid categories file ${path}: expected a list of category names`);
    }
    const list = Array.isArray(parsed.data) ? parsed.data : (parsed.data.categories ?? []);
    return [...new Set(list)];
}

/**
 * Loads categorizer settings (config/settings.yaml) over the defaults.
 * Missing file → defaults. Invalid values throw.
 */
export function loadSettings(workspace: Workspace): CategorizerConfig {
    const path = workspace.config.settingsPath;
    if (!existsSync(path)) {
        return DEFAULT_CONFIG;
    }
    const data: unknown = parse(readFileSync(path, 'utf-8')) ?? {};
    const parsed = CategorizerConfigSchema.safeParse(data);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid settings in ${path}: ${details}`);
    }
    return freezeConfig(parsed.data);
}
