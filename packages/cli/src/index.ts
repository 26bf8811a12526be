#!/usr/bin/env node
/**
 * spendsort CLI
 *
 * The CLI owns all file and network I/O:
 * - reads the transaction CSV, rules, categories and settings
 * - supplies the remote classifier and the rule store to the core
 * - prints the warnings the core returns as data
 */

import { categorizeFile } from './commands/categorize.js';
import { learn } from './commands/learn.js';
import { addRule } from './commands/add-rule.js';
import { errorMessage } from './utils/console.js';
import { parseArgs } from './args.js';

const USAGE = [
    'spendsort v0.1.0',
    '',
    'Usage:',
    '  spendsort categorize <transactions.csv> [--all] [--interactive] [--dry-run] [--workspace <dir>]',
    '  spendsort learn "<description>" <category> [--workspace <dir>]',
    '  spendsort add-rule <keyword> [category] [--workspace <dir>]',
    '',
    'Examples:',
    '  spendsort categorize imports/2026-01.csv --interactive',
    '  spendsort learn "SUPER PHARM RAMAT AVIV" Health',
    '  spendsort add-rule "!transfer"',
];

function fail(message: string): never {
    console.error(`✖ Error: ${message}`);
    console.error('');
    console.error(USAGE.join('\n'));
    process.exit(1);
}

async function main(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    switch (args.command) {
        case undefined:
        case 'help':
            console.log(USAGE.join('\n'));
            return;

        case 'categorize': {
            const [file] = args.positional;
            if (!file) fail('categorize needs a transaction file');
            await categorizeFile(file, {
                all: args.flags.has('all'),
                interactive: args.flags.has('interactive'),
                dryRun: args.flags.has('dry-run'),
                workspace: args.workspace,
            });
            return;
        }

        case 'learn': {
            const [description, category] = args.positional;
            if (!description || !category) fail('learn needs a description and a category');
            await learn(description, category, { workspace: args.workspace });
            return;
        }

        case 'add-rule': {
            const [keyword, category] = args.positional;
            if (!keyword) fail('add-rule needs a keyword');
            await addRule(keyword, category, { workspace: args.workspace });
            return;
        }

        default:
            fail(`Unknown command "${args.command}"`);
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
