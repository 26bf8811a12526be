import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import Decimal from 'decimal.js';
import { TransactionSchema, type Transaction } from '@spendsort/core';
import type { TransactionReadResult } from '@spendsort/shared';

const REQUIRED_COLUMNS = ['date', 'description', 'amount'];

/** Drops a leading UTF-8 byte order mark, which spreadsheet exports often add. */
export function stripBom(value: string): string {
    return value.startsWith('\uFEFF') ? value.slice(1) : value;
}

function cell(row: Record<string, unknown>, column: string): string {
    const value = row[column];
    return value === undefined || value === null ? '' : String(value).trim();
}

/**
 * Parse an already-normalized transaction CSV: date (YYYY-MM-DD), description,
 * amount, optional category. Header names are matched case-insensitively.
 *
 * Rows with a bad date or amount are skipped and counted; a missing required
 * column throws.
 *
 * @param text - CSV contents
 * @param source - File name used in messages
 */
export function parseTransactionsCsv(text: string, source: string): TransactionReadResult {
    const workbook = XLSX.read(stripBom(text), { type: 'string', raw: true });
    const sheet = workbook.Sheets[workbook.SheetNames[0]];
    const warnings: string[] = [];
    const transactions: Transaction[] = [];

    if (!sheet) {
        return { transactions, warnings, skippedRows: 0 };
    }

    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' }).map((row) => {
        const clean: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(row)) {
            clean[stripBom(k).trim().toLowerCase()] = v;
        }
        return clean;
    });

    if (rows.length === 0) {
        return { transactions, warnings, skippedRows: 0 };
    }

    const firstRow = rows[0];
    const missingColumns = REQUIRED_COLUMNS.filter((col) => !(col in firstRow));
    if (missingColumns.length > 0) {
        throw new Error(
            `${source}: Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${Object.keys(firstRow).join(', ')}`
        );
    }

    let skippedDates = 0;
    let skippedAmounts = 0;

    rows.forEach((row, index) => {
        const line = index + 2;
        const date = cell(row, 'date');
        if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
            skippedDates++;
            return;
        }

        const rawAmount = cell(row, 'amount');
        let amount: Decimal;
        try {
            amount = new Decimal(rawAmount.replace(/,/g, ''));
        } catch {
            warnings.push(`Invalid amount "${rawAmount}" on line ${line}, skipping`);
            skippedAmounts++;
            return;
        }

        const category = cell(row, 'category');
        const txn: Transaction = {
            date,
            description: cell(row, 'description'),
            amount: amount.toString(),
            ...(category ? { category } : {}),
        };

        const parsed = TransactionSchema.safeParse(txn);
        if (parsed.success) {
            transactions.push(parsed.data);
        } else {
            warnings.push(`Invalid amount "${rawAmount}" on line ${line}, skipping`);
            skippedAmounts++;
        }
    });

    if (skippedDates) {
        warnings.push(`Skipped ${skippedDates} rows with invalid or missing dates`);
    }
    if (skippedAmounts) {
        warnings.push(`Skipped ${skippedAmounts} rows with invalid amounts`);
    }

    return { transactions, warnings, skippedRows: skippedDates + skippedAmounts };
}

/**
 * Read a transaction CSV from disk.
 */
export async function readTransactionsFile(filePath: string): Promise<TransactionReadResult> {
    const text = await readFile(filePath, 'utf8');
    return parseTransactionsCsv(text, filePath);
}
