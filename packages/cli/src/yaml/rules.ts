import { parse, parseDocument, isMap, isNode, isSeq, type YAMLSeq } from 'yaml';
import { readFile, writeFile } from 'node:fs/promises';
import { MappingRuleSchema, dedupeRules, isExclusionRule } from '@spendsort/core';
import type { MappingRule, RuleStore } from '@spendsort/core';

const EMPTY_RULES_FILE = '# spendsort keyword rules\n# A keyword starting with "!" excludes matching transactions.\nrules:\n';

export interface RulesLoadResult {
    rules: MappingRule[];
    warnings: string[];
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
    return err instanceof Error && 'code' in err;
}

function ruleEntries(data: unknown): unknown[] | null {
    // Support either a direct array or a wrapped object { rules: [...] }
    if (Array.isArray(data)) return data;
    if (data !== null && typeof data === 'object' && 'rules' in data) {
        const { rules } = data;
        if (rules === null || rules === undefined) return [];
        if (Array.isArray(rules)) return rules;
    }
    return null;
}

/**
 * Parse rule file contents. Never throws: a corrupt document or an invalid
 * entry becomes a warning and the entry is skipped.
 *
 * @param content - YAML text
 * @param source - File name used in warnings
 */
export function parseRulesYaml(content: string, source: string): RulesLoadResult {
    const warnings: string[] = [];

    let data: unknown;
    try {
        data = parse(content);
    } catch (err) {
        warnings.push(`Could not parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
        return { rules: [], warnings };
    }

    if (data === null || data === undefined) {
        return { rules: [], warnings };
    }

    const entries = ruleEntries(data);
    if (entries === null) {
        warnings.push(`Invalid structure in ${source}: expected a list of rules`);
        return { rules: [], warnings };
    }

    const rules: MappingRule[] = [];
    entries.forEach((entry, index) => {
        const parsed = MappingRuleSchema.safeParse(entry);
        if (parsed.success) {
            rules.push(parsed.data);
        } else {
            const reason = parsed.error.issues.map((issue) => issue.message).join(', ');
            warnings.push(`Skipping rule #${index + 1} in ${source}: ${reason}`);
        }
    });

    return { rules: dedupeRules(rules), warnings };
}

/**
 * Read the rule file. A missing file means no rules yet; a file that cannot
 * be read loads as no rules with a warning.
 */
export async function readRulesFile(filePath: string): Promise<RulesLoadResult> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') {
            return { rules: [], warnings: [] };
        }
        const reason = err instanceof Error ? err.message : String(err);
        return { rules: [], warnings: [`Could not read ${filePath}: ${reason}`] };
    }
    return parseRulesYaml(content, filePath);
}

function toYamlEntry(rule: MappingRule): { keyword: string; category?: string } {
    return isExclusionRule(rule) && rule.category === ''
        ? { keyword: rule.keyword }
        : { keyword: rule.keyword, category: rule.category };
}

/**
 * Swap the valid rules in a sequence for `nodes`. Items that are not valid
 * rules were skipped on load and are kept after the new nodes.
 */
function replaceRuleItems(seq: YAMLSeq, nodes: readonly unknown[]): void {
    const unparsed = seq.items.filter(
        (item) => !MappingRuleSchema.safeParse(isNode(item) ? item.toJSON() : item).success
    );
    seq.items = [...nodes, ...unparsed];
}

/**
 * Rewrites the rule list in a YAML file while preserving the document's comments.
 * The list written is deduplicated by keyword (first occurrence wins). Entries
 * that do not parse as rules stay in the file untouched.
 */
export async function writeRulesYaml(filePath: string, rules: readonly MappingRule[]): Promise<void> {
    let content = '';
    try {
        content = await readFile(filePath, 'utf8');
    } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') {
            content = EMPTY_RULES_FILE;
        } else {
            throw err;
        }
    }

    const doc = parseDocument(content || EMPTY_RULES_FILE);
    if (doc.errors.length > 0) {
        throw new Error(`Refusing to overwrite ${filePath}: ${doc.errors[0].message}`);
    }

    const entries = dedupeRules(rules).map(toYamlEntry);
    const nodes = entries.map((entry) => doc.createNode(entry));
    const root = doc.contents;

    if (isSeq(root)) {
        // Case 1: Top-level sequence
        replaceRuleItems(root, nodes);
    } else if (isMap(root)) {
        // Case 2: Top-level mapping, other keys and comments stay
        const existing = doc.get('rules');
        if (isSeq(existing)) {
            replaceRuleItems(existing, nodes);
        } else if (existing !== undefined && existing !== null) {
            throw new Error(`Invalid YAML structure in ${filePath}: "rules" must be a list.`);
        } else {
            doc.set('rules', doc.createNode(entries));
        }
    } else {
        // Case 3: Empty document
        doc.set('rules', doc.createNode(entries));
    }

    await writeFile(filePath, doc.toString());
}

/**
 * Rule store backed by one YAML file.
 *
 * All writes go through a single promise chain, so a read-modify-write from
 * update() never interleaves with another save().
 */
export class YamlRuleStore implements RuleStore {
    private queue: Promise<void> = Promise.resolve();

    constructor(readonly filePath: string) {}

    load(): Promise<RulesLoadResult> {
        return this.enqueue(() => readRulesFile(this.filePath));
    }

    save(rules: readonly MappingRule[]): Promise<void> {
        const snapshot = dedupeRules(rules);
        return this.enqueue(() => writeRulesYaml(this.filePath, snapshot));
    }

    /**
     * Read the current rules, transform them and write the result back.
     * @returns The rules written
     */
    update(change: (rules: MappingRule[]) => MappingRule[]): Promise<MappingRule[]> {
        return this.enqueue(async () => {
            const { rules } = await readRulesFile(this.filePath);
            const next = dedupeRules(change(rules));
            await writeRulesYaml(this.filePath, next);
            return next;
        });
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // The caller sees the failure through `run`; the chain itself keeps going.
        this.queue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }
}
