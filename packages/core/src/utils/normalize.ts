/**
 * Text normalization for matching.
 *
 * Bank exports mix Hebrew and English, carry bidi control marks around
 * numbers and use non-breaking spaces as separators. All matchers work on
 * text that went through normalizeText first.
 */

import { LEGAL_ENTITY_SUFFIXES } from '../types/index.js';

// LRM, RLM, embeddings/overrides and isolates
const DIRECTIONAL_MARKS = /[\u200e\u200f\u202a-\u202e\u2066-\u2069]/g;
// Zero-width space/joiners and BOM
const ZERO_WIDTH = /[\u200b-\u200d\ufeff]/g;
// NBSP and the typographic spaces
const INVISIBLE_SPACES = /[\u00a0\u2000-\u200a]/g;

const SUFFIXES: ReadonlySet<string> = new Set(LEGAL_ENTITY_SUFFIXES);

/**
 * Replace directional and invisible marks with spaces, collapse whitespace, trim.
 */
export function normalizeText(text: string): string {
    return text
        .replace(DIRECTIONAL_MARKS, ' ')
        .replace(ZERO_WIDTH, ' ')
        .replace(INVISIBLE_SPACES, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Lower-cased whitespace tokens of the normalized text.
 */
export function tokenize(text: string): string[] {
    const normalized = normalizeText(text).toLowerCase();
    return normalized === '' ? [] : normalized.split(' ');
}

function isLegalEntitySuffix(token: string): boolean {
    return SUFFIXES.has(token) || SUFFIXES.has(token.replace(/[.,]+$/, ''));
}

/**
 * Normalize a vendor name for vendor-map keys and fuzzy lookups.
 *
 * Lower-cases, drops legal-entity suffix tokens ("ltd", "בע״מ", ...) and
 * collapses whitespace. Suffixes are removed as whole tokens only, so
 * normalizeVendorName(normalizeVendorName(x)) === normalizeVendorName(x).
 *
 * @example
 * normalizeVendorName('Super  Pharm Ltd.') // 'super pharm'
 */
export function normalizeVendorName(text: string): string {
    return tokenize(text)
        .filter((token) => !isLegalEntitySuffix(token))
        .join(' ');
}
