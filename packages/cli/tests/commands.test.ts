import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import exceljs from 'exceljs';
import { categorizeFile, collectCategories } from '../src/commands/categorize.js';
import { learn } from '../src/commands/learn.js';
import { readRulesFile } from '../src/yaml/rules.js';

const prompt = vi.hoisted(() => ({ confirm: vi.fn(), close: vi.fn() }));

vi.mock('../src/utils/prompt.js', () => ({
    createCategoryPrompt: () => ({ confirm: prompt.confirm, close: prompt.close }),
}));

const TRANSACTIONS_CSV = [
    'date,description,amount,category',
    '2026-01-10,SUPER MARKET CHAIN #1200,-80.00,Groceries',
    '2026-01-15,gas station fuel,-200,',
    '2026-01-16,SUPER MARKET CHAIN #4521,-50.75,',
    '2026-01-17,BANK TRANSFER 1234,500,',
    '2026-01-18,UNKNOWN MERCHANT XYZ,-10,',
].join('\n');

describe('CLI commands', () => {
    let root: string;
    let rulesPath: string;
    let csvPath: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'spendsort-cmd-'));
        await mkdir(join(root, 'config'));
        rulesPath = join(root, 'config', 'rules.yaml');
        csvPath = join(root, 'jan.csv');
        await writeFile(rulesPath, 'rules:\n  - keyword: gas\n    category: Transportation\n  - keyword: "!transfer"\n');
        await writeFile(csvPath, TRANSACTIONS_CSV);

        vi.stubEnv('OPENAI_API_KEY', '');
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        vi.spyOn(console, 'info').mockImplementation(() => undefined);
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        vi.spyOn(process, 'exit').mockImplementation(() => {
            throw new Error('exit');
        });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
        await rm(root, { recursive: true, force: true });
    });

    describe('categorize', () => {
        it('writes the categorized workbook', async () => {
            await categorizeFile(csvPath, { all: false, interactive: false, dryRun: false, workspace: root });

            const outputPath = join(root, 'outputs', 'jan.categorized.xlsx');
            expect(existsSync(outputPath)).toBe(true);

            const workbook = new exceljs.Workbook();
            await workbook.xlsx.readFile(outputPath);
            const sheet = workbook.getWorksheet('Transactions');
            expect(sheet).toBeDefined();
            if (!sheet) return;

            // columns: date, description, amount, category, strategy, confidence, evidence, note
            expect(sheet.getRow(2).getCell(4).value).toBe('Groceries');
            expect(sheet.getRow(2).getCell(8).value).toBe('Already categorized');
            expect(sheet.getRow(3).getCell(4).value).toBe('Transportation');
            expect(sheet.getRow(3).getCell(5).value).toBe('keyword');
            expect(sheet.getRow(4).getCell(4).value).toBe('Groceries');
            expect(sheet.getRow(4).getCell(5).value).toBe('fuzzy');
            expect(sheet.getRow(5).getCell(5).value).toBe('none');
            expect(sheet.getRow(5).getCell(7).value).toBe('!transfer');
            expect(sheet.getRow(6).getCell(5).value).toBe('none');
        });

        it('prints the strategy counts', async () => {
            await categorizeFile(csvPath, { all: false, interactive: false, dryRun: true, workspace: root });

            expect(console.log).toHaveBeenCalledWith('→ Keyword:   1');
            expect(console.log).toHaveBeenCalledWith('→ Fuzzy:     1');
            expect(console.log).toHaveBeenCalledWith('→ No match:  2');
            expect(console.log).toHaveBeenCalledWith('→ Skipped:   1');
        });

        it('writes nothing on a dry run', async () => {
            await categorizeFile(csvPath, { all: false, interactive: false, dryRun: true, workspace: root });
            expect(existsSync(join(root, 'outputs'))).toBe(false);
            expect(console.log).toHaveBeenCalledWith('\n[DRY RUN] No files were written.');
        });

        it('exits when the transaction file is missing', async () => {
            await expect(
                categorizeFile(join(root, 'missing.csv'), { all: false, interactive: false, dryRun: true, workspace: root })
            ).rejects.toThrow('exit');
        });

        it('exits with the prompt error when a confirmation fails', async () => {
            prompt.confirm.mockRejectedValue(new Error('input closed'));

            await expect(
                categorizeFile(csvPath, { all: false, interactive: true, dryRun: true, workspace: root })
            ).rejects.toThrow('exit');
            expect(console.error).toHaveBeenCalledWith('\n✖ Error: Categorization stopped: input closed');
            expect(prompt.close).toHaveBeenCalled();
        });

        it('exits on invalid settings', async () => {
            await writeFile(join(root, 'config', 'settings.yaml'), 'fuzzyThreshold: 500\n');
            await expect(
                categorizeFile(csvPath, { all: false, interactive: false, dryRun: true, workspace: root })
            ).rejects.toThrow('exit');
        });
    });

    describe('learn', () => {
        it('stores rules learned from a description', async () => {
            await learn('ESPRESSO BAR DIZENGOFF', 'Coffee', { workspace: root });

            const { rules } = await readRulesFile(rulesPath);
            expect(rules).toEqual([
                { keyword: 'gas', category: 'Transportation' },
                { keyword: '!transfer', category: '' },
                { keyword: 'espresso bar', category: 'Coffee' },
                { keyword: 'espresso bar dizengoff', category: 'Coffee' },
                { keyword: 'espresso', category: 'Coffee' },
            ]);
            expect(console.log).toHaveBeenCalledWith('✓ Learned 3 rules for "Coffee"');
        });

        it('adds nothing when the rules already exist', async () => {
            await learn('ESPRESSO BAR DIZENGOFF', 'Coffee', { workspace: root });
            await learn('ESPRESSO BAR DIZENGOFF', 'Coffee', { workspace: root });

            expect((await readRulesFile(rulesPath)).rules).toHaveLength(5);
            expect(console.log).toHaveBeenLastCalledWith(
                'No new rules: the description is already covered or has no usable vendor words.'
            );
        });

        it('rejects an empty category', async () => {
            await expect(learn('ESPRESSO BAR', '  ', { workspace: root })).rejects.toThrow('exit');
        });
    });
});

describe('collectCategories', () => {
    it('merges configured, rule and transaction categories in order', () => {
        const categories = collectCategories(
            ['Groceries', 'Coffee'],
            ['Transportation', '', 'Coffee'],
            [
                { date: '2026-01-01', description: 'a', amount: '1', category: 'Health' },
                { date: '2026-01-02', description: 'b', amount: '1' },
            ]
        );
        expect(categories).toEqual(['Groceries', 'Coffee', 'Transportation', 'Health']);
    });
});
