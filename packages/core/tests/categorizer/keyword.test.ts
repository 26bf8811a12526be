import { describe, it, expect } from 'vitest';
import { matchKeyword } from '../../src/categorizer/keyword.js';
import { DEFAULT_CONFIG, createConfig } from '../../src/types/index.js';
import type { MappingRule } from '../../src/types/index.js';

describe('matchKeyword', () => {
    describe('single keywords', () => {
        it('scores an exact token match at 0.95', () => {
            const rules: MappingRule[] = [{ keyword: 'gas', category: 'Transportation' }];
            const result = matchKeyword('gas station fuel', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('Transportation');
            expect(result.confidence).toBe(0.95);
            expect(result.evidence).toBe('gas');
            expect(result.excluded).toBe(false);
        });

        it('matches case-insensitively', () => {
            const rules: MappingRule[] = [{ keyword: 'netflix', category: 'Subscriptions' }];
            const result = matchKeyword('NETFLIX MONTHLY', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('Subscriptions');
            expect(result.confidence).toBe(0.95);
        });

        it('scores a substring of a concatenated token at 0.85', () => {
            const rules: MappingRule[] = [{ keyword: 'paypal', category: 'Online' }];
            const result = matchKeyword('PAYPAL*SPOTIFY', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('Online');
            expect(result.confidence).toBe(0.85);
        });

        it('ignores substring hits of keywords with 4 characters or fewer', () => {
            const rules: MappingRule[] = [{ keyword: 'uber', category: 'Transportation' }];
            const result = matchKeyword('HUBERT STORE', rules, DEFAULT_CONFIG);
            expect(result.category).toBeNull();
            expect(result.confidence).toBe(0);
        });

        it('scores an exact match at least as high as a substring match', () => {
            const rules: MappingRule[] = [{ keyword: 'market', category: 'Groceries' }];
            const exact = matchKeyword('fresh market', rules, DEFAULT_CONFIG);
            const partial = matchKeyword('freshmarket', rules, DEFAULT_CONFIG);
            expect(exact.confidence).toBe(0.95);
            expect(partial.confidence).toBe(0.85);
            expect(exact.confidence).toBeGreaterThanOrEqual(partial.confidence);
        });

        it('strips directional marks before matching', () => {
            const rules: MappingRule[] = [{ keyword: 'gas', category: 'Transportation' }];
            const result = matchKeyword('\u200fgas\u200f station', rules, DEFAULT_CONFIG);
            expect(result.confidence).toBe(0.95);
        });
    });

    describe('phrases', () => {
        it('scores a two-word phrase at 0.97', () => {
            const rules: MappingRule[] = [{ keyword: 'super market', category: 'Groceries' }];
            const result = matchKeyword('SUPER MARKET CHAIN', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('Groceries');
            expect(result.confidence).toBeCloseTo(0.97);
        });

        it('caps long phrases at 0.98', () => {
            const rules: MappingRule[] = [{ keyword: 'city parking lot north', category: 'Parking' }];
            const result = matchKeyword('CITY PARKING LOT NORTH GATE', rules, DEFAULT_CONFIG);
            expect(result.confidence).toBe(0.98);
        });

        it('prefers the more specific phrase over a single word', () => {
            const rules: MappingRule[] = [
                { keyword: 'gas', category: 'Transportation' },
                { keyword: 'gas station', category: 'Fuel' },
            ];
            const result = matchKeyword('gas station fuel', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('Fuel');
            expect(result.evidence).toBe('gas station');
        });

        it('matches Hebrew phrases', () => {
            const rules: MappingRule[] = [{ keyword: 'רמי לוי', category: 'מזון' }];
            const result = matchKeyword('רמי לוי שיווק השקמה', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('מזון');
            expect(result.confidence).toBeCloseTo(0.97);
        });
    });

    describe('tie-break', () => {
        it('keeps the first rule on equal scores', () => {
            const rules: MappingRule[] = [
                { keyword: 'fuel', category: 'Fuel' },
                { keyword: 'gas', category: 'Transportation' },
            ];
            const result = matchKeyword('gas fuel', rules, DEFAULT_CONFIG);
            expect(result.category).toBe('Fuel');
        });
    });

    describe('exclusions', () => {
        it('returns no category when an exclusion root occurs', () => {
            const rules: MappingRule[] = [
                { keyword: 'creditcardco', category: 'Fees' },
                { keyword: '!creditcardco', category: '' },
            ];
            const result = matchKeyword('CREDITCARDCO PAYMENT', rules, DEFAULT_CONFIG);
            expect(result.excluded).toBe(true);
            expect(result.category).toBeNull();
            expect(result.confidence).toBe(0);
            expect(result.evidence).toBe('!creditcardco');
        });

        it('matches the exclusion root as a substring', () => {
            const rules: MappingRule[] = [{ keyword: '!transfer', category: '' }];
            const result = matchKeyword('BANKTRANSFER 1234', rules, DEFAULT_CONFIG);
            expect(result.excluded).toBe(true);
        });

        it('ignores exclusion rules with an empty root', () => {
            const rules: MappingRule[] = [
                { keyword: '!', category: '' },
                { keyword: 'gas', category: 'Transportation' },
            ];
            const result = matchKeyword('gas station', rules, DEFAULT_CONFIG);
            expect(result.excluded).toBe(false);
            expect(result.category).toBe('Transportation');
        });
    });

    describe('degenerate input', () => {
        it('returns confidence 0 for an empty description', () => {
            const rules: MappingRule[] = [{ keyword: 'gas', category: 'Transportation' }];
            const result = matchKeyword('', rules, DEFAULT_CONFIG);
            expect(result.category).toBeNull();
            expect(result.confidence).toBe(0);
            expect(result.note).toBe('Empty description');
        });

        it('returns confidence 0 without rules', () => {
            const result = matchKeyword('UNKNOWN MERCHANT XYZ', [], DEFAULT_CONFIG);
            expect(result.category).toBeNull();
            expect(result.note).toBe('No keyword matches found');
        });
    });

    it('uses confidence values from the config', () => {
        const config = createConfig({ confidence: { keywordExact: 0.9 } });
        const rules: MappingRule[] = [{ keyword: 'gas', category: 'Transportation' }];
        expect(matchKeyword('gas station', rules, config).confidence).toBe(0.9);
    });
});
