/**
 * Vendor map construction from previously categorized transactions.
 */

import { normalizeVendorName, tokenize } from '../utils/normalize.js';
import type { Transaction } from '../types/index.js';

/**
 * Rebuild the vendor map at session start.
 *
 * Transactions without a category, or whose leading vendor phrase is too
 * short to be meaningful, are skipped. Later transactions override earlier
 * ones for the same key.
 */
export function buildVendorMap(transactions: readonly Transaction[]): Map<string, string> {
    const vendorMap = new Map<string, string>();

    for (const txn of transactions) {
        const category = txn.category?.trim();
        if (!category) continue;

        const vendor = tokenize(txn.description).slice(0, 3).join(' ');
        if (vendor.length <= 2) continue;

        const key = normalizeVendorName(txn.description);
        if (key !== '') {
            vendorMap.set(key, category);
        }
    }

    return vendorMap;
}
