import type { Workbook, Worksheet } from 'exceljs';
import Decimal from 'decimal.js';
import type { CategorizationStats, CategorizedTransaction } from '@spendsort/core';
import {
    createWorkbook,
    formatHeaderRow,
    autoFitColumns,
    formatCurrencyCell,
    formatPercentCell,
} from './utils.js';

export const CATEGORIZED_COLUMNS = [
    'date',
    'description',
    'amount',
    'category',
    'strategy',
    'confidence',
    'evidence',
    'note',
] as const;

/**
 * Generates the categorization workbook.
 *
 * Sheets:
 * - Transactions: every input row in input order with the decision made for it
 * - Review: rows still without a category, lowest confidence first
 * - Summary: counts per strategy
 */
export async function generateCategorizedExcel(
    categorized: readonly CategorizedTransaction[],
    stats: CategorizationStats
): Promise<Workbook> {
    const workbook = createWorkbook();

    addTransactionSheet(workbook.addWorksheet('Transactions'), categorized);
    addTransactionSheet(
        workbook.addWorksheet('Review'),
        categorized
            .filter((item) => item.category === null)
            .sort((a, b) => a.result.confidence - b.result.confidence)
    );
    addSummarySheet(workbook.addWorksheet('Summary'), stats);

    return workbook;
}

function addTransactionSheet(sheet: Worksheet, rows: readonly CategorizedTransaction[]): void {
    sheet.columns = CATEGORIZED_COLUMNS.map((key) => ({ header: key, key }));

    for (const { transaction, result, category } of rows) {
        sheet.addRow({
            date: transaction.date,
            description: transaction.description,
            amount: new Decimal(transaction.amount).toNumber(),
            category: category ?? '',
            strategy: result.strategy,
            confidence: result.confidence,
            evidence: result.evidence ?? '',
            note: result.note,
        });
    }

    formatHeaderRow(sheet);
    formatCurrencyCell(sheet, 'amount');
    formatPercentCell(sheet, 'confidence');
    autoFitColumns(sheet);

    // Freeze date and description columns
    sheet.views = [
        { state: 'frozen', xSplit: 2, ySplit: 1 }
    ];
}

function addSummarySheet(sheet: Worksheet, stats: CategorizationStats): void {
    sheet.columns = [
        { header: 'metric', key: 'metric' },
        { header: 'count', key: 'count' },
    ];

    const rows: [string, number][] = [
        ['total', stats.total],
        ['keyword', stats.byStrategy.keyword],
        ['fuzzy', stats.byStrategy.fuzzy],
        ['remote', stats.byStrategy.remote],
        ['none', stats.byStrategy.none],
        ['skipped', stats.skipped],
        ['confirmed', stats.confirmed],
        ['rules_learned', stats.rulesLearned],
    ];
    for (const [metric, count] of rows) {
        sheet.addRow({ metric, count });
    }

    formatHeaderRow(sheet);
    autoFitColumns(sheet);
}
