/**
 * Report rendering. Returns lines and strings; printing is the caller's job.
 */

import type { Transaction, ReconcileResult } from '../types/index.js';
import { REPORT_LAYOUT, CONFIG_DEFAULTS } from '../types/index.js';
import { formatAmount } from '../utils/amount.js';

export interface TextReportOptions {
    labels?: { a: string; b: string };
    summary?: boolean;
    columnWidth?: number;
}

/**
 * One fixed-width report line, e.g.
 * `Transaction: 2020-12-04 |   Tecnologia |    Bitbucket | 16.00 | Status:    FOUND`
 *
 * Text columns are right-aligned and never truncated.
 */
export function formatTransaction(
    txn: Transaction,
    columnWidth: number = REPORT_LAYOUT.COLUMN_WIDTH
): string {
    const department = txn.department.padStart(columnWidth);
    const counterpart = txn.counterpart.padStart(columnWidth);
    const value = formatAmount(txn.value, REPORT_LAYOUT.AMOUNT_DECIMALS).padStart(REPORT_LAYOUT.AMOUNT_WIDTH);
    const status = txn.status.padStart(REPORT_LAYOUT.STATUS_WIDTH);
    return `Transaction: ${txn.date} | ${department} | ${counterpart} | ${value} | Status: ${status}`;
}

/**
 * Both ledgers as text: a heading per ledger, one line per record,
 * a blank line between the ledgers.
 */
export function renderTextReport(result: ReconcileResult, options: TextReportOptions = {}): string[] {
    const labels = options.labels ?? { a: CONFIG_DEFAULTS.LABEL_A, b: CONFIG_DEFAULTS.LABEL_B };
    const columnWidth = options.columnWidth ?? REPORT_LAYOUT.COLUMN_WIDTH;

    const lines: string[] = [];
    lines.push(`${labels.a}:`);
    for (const txn of result.ledgerA) {
        lines.push(formatTransaction(txn, columnWidth));
    }
    lines.push('');
    lines.push(`${labels.b}:`);
    for (const txn of result.ledgerB) {
        lines.push(formatTransaction(txn, columnWidth));
    }

    if (options.summary) {
        const { stats } = result;
        lines.push('');
        lines.push(
            `Summary: ${stats.found_a}/${stats.total_a} found in ${labels.a}, ` +
            `${stats.found_b}/${stats.total_b} found in ${labels.b}, ` +
            `${stats.matches} matched pairs`
        );
    }

    return lines;
}

/**
 * The whole result as pretty-printed JSON. Amounts stay decimal strings.
 */
export function renderJsonReport(result: ReconcileResult): string {
    return JSON.stringify(
        {
            ledgerA: result.ledgerA,
            ledgerB: result.ledgerB,
            matches: result.matches,
            stats: result.stats,
        },
        null,
        2
    );
}
