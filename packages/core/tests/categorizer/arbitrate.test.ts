import { describe, it, expect, vi } from 'vitest';
import { arbitrate, chooseCategory, applyAgreementBoost } from '../../src/categorizer/arbitrate.js';
import type { RemoteClassifier } from '../../src/categorizer/remote.js';
import type { RuleContext } from '../../src/categorizer/types.js';
import { DEFAULT_CONFIG, createConfig } from '../../src/types/index.js';
import type { MatchResult } from '../../src/types/index.js';

function context(overrides: Partial<RuleContext> = {}): RuleContext {
    return {
        rules: [],
        vendorMap: new Map(),
        categories: ['Transportation', 'Groceries', 'Food', 'Fees'],
        ...overrides,
    };
}

function stubClassifier(answer: string): RemoteClassifier {
    return { classify: vi.fn().mockResolvedValue(answer) };
}

describe('chooseCategory', () => {
    describe('scenarios', () => {
        it('takes a keyword hit', async () => {
            const result = await chooseCategory(
                'gas station fuel',
                context({ rules: [{ keyword: 'gas', category: 'Transportation' }] }),
                DEFAULT_CONFIG
            );
            expect(result.category).toBe('Transportation');
            expect(result.strategy).toBe('keyword');
            expect(result.confidence).toBe(0.95);
        });

        it('takes a fuzzy vendor hit', async () => {
            const result = await chooseCategory(
                'SUPER MARKET CHAIN #4521',
                context({ vendorMap: new Map([['super market chain', 'Groceries']]) }),
                createConfig({ fuzzyThreshold: 86 })
            );
            expect(result.category).toBe('Groceries');
            expect(result.strategy).toBe('fuzzy');
            expect(result.confidence).toBeGreaterThanOrEqual(0.9);
            expect(result.confidence).toBeLessThanOrEqual(0.95);
        });

        it('refuses to guess without any signal', async () => {
            const result = await chooseCategory('UNKNOWN MERCHANT XYZ', context(), DEFAULT_CONFIG);
            expect(result.category).toBeNull();
            expect(result.strategy).toBe('none');
            expect(result.confidence).toBe(0);
        });

        it('lets an exclusion override fuzzy and remote signals', async () => {
            const classifier = stubClassifier('Fees');
            const result = await chooseCategory(
                'CREDITCARDCO PAYMENT 0423',
                context({
                    rules: [{ keyword: '!creditcardco', category: 'Fees' }],
                    vendorMap: new Map([['creditcardco payment', 'Fees']]),
                }),
                DEFAULT_CONFIG,
                { classifier }
            );
            expect(result.category).toBeNull();
            expect(result.strategy).toBe('none');
            expect(result.evidence).toBe('!creditcardco');
            expect(classifier.classify).not.toHaveBeenCalled();
        });
    });

    describe('agreement boost', () => {
        it('boosts tiers that agree and keeps evaluation order on ties', async () => {
            const { result, tiers } = await arbitrate(
                'gas station fuel',
                context({
                    rules: [{ keyword: 'gas', category: 'Transportation' }],
                    vendorMap: new Map([['gas station fuel', 'Transportation']]),
                }),
                DEFAULT_CONFIG
            );
            expect(tiers.map((t) => t.confidence)).toEqual([0.98, 0.98]);
            expect(result.strategy).toBe('keyword');
            expect(result.confidence).toBe(0.98);
        });

        it('leaves a single proposing tier unchanged', async () => {
            const result = await chooseCategory(
                'gas station fuel',
                context({ rules: [{ keyword: 'gas', category: 'Transportation' }] }),
                DEFAULT_CONFIG,
                { classifier: stubClassifier('Food') }
            );
            expect(result.category).toBe('Transportation');
            expect(result.confidence).toBe(0.95);
        });

        it('does not mutate the input results', () => {
            const results: MatchResult[] = [
                { strategy: 'keyword', excluded: false, category: 'Food', confidence: 0.85, note: 'k' },
                { strategy: 'remote', category: 'Food', confidence: 0.75, note: 'r' },
            ];
            const boosted = applyAgreementBoost(results, DEFAULT_CONFIG);
            expect(boosted[0].confidence).toBeCloseTo(0.98);
            expect(boosted[1].confidence).toBeCloseTo(0.9);
            expect(boosted[1].note).toBe('r; boosted by agreement');
            expect(results[0].confidence).toBe(0.85);
            expect(results[1].confidence).toBe(0.75);
        });

        it('ignores results without a category', () => {
            const results: MatchResult[] = [
                { strategy: 'keyword', excluded: false, category: null, confidence: 0, note: 'k' },
                { strategy: 'fuzzy', category: null, confidence: 0, note: 'f' },
            ];
            expect(applyAgreementBoost(results, DEFAULT_CONFIG)).toEqual(results);
        });
    });

    describe('remote tier', () => {
        it('uses the remote answer when the local tiers miss', async () => {
            const result = await chooseCategory('CAFE AROMA', context(), DEFAULT_CONFIG, {
                classifier: stubClassifier('Food'),
                context: { amount: '-18.00', date: '2026-02-11' },
            });
            expect(result.strategy).toBe('remote');
            expect(result.category).toBe('Food');
            expect(result.confidence).toBe(0.75);
        });

        it('keeps the local answer when the remote call fails', async () => {
            const classifier: RemoteClassifier = {
                classify: vi.fn().mockRejectedValue(new Error('timeout')),
            };
            const result = await chooseCategory(
                'gas station fuel',
                context({ rules: [{ keyword: 'gas', category: 'Transportation' }] }),
                DEFAULT_CONFIG,
                { classifier }
            );
            expect(result.strategy).toBe('keyword');
            expect(result.category).toBe('Transportation');
        });

        it('reports the remote failure as a tier result', async () => {
            const classifier: RemoteClassifier = {
                classify: vi.fn().mockRejectedValue(new Error('timeout')),
            };
            const { result, tiers } = await arbitrate('CAFE AROMA', context(), DEFAULT_CONFIG, { classifier });
            expect(result.strategy).toBe('none');
            expect(tiers[2].note).toBe('remote classifier failed: timeout');
        });
    });

    describe('minimum confidence', () => {
        it('refuses a winner below the cutoff', async () => {
            const config = createConfig({ confidence: { remote: 0.6 } });
            const result = await chooseCategory('CAFE AROMA', context(), config, {
                classifier: stubClassifier('Food'),
            });
            expect(result.strategy).toBe('none');
            expect(result.category).toBeNull();
            expect(result.note).toBe('No high-confidence match found (all strategies below 0.70 threshold)');
        });

        it('honours a custom cutoff', async () => {
            const config = createConfig({ minConfidence: 0.96 });
            const result = await chooseCategory(
                'gas station fuel',
                context({ rules: [{ keyword: 'gas', category: 'Transportation' }] }),
                config
            );
            expect(result.strategy).toBe('none');
        });
    });
});
