/**
 * Row validation shared by every ledger format.
 *
 * Rows arrive as arrays of cells in column order: date, department,
 * amount, counterpart. Each row either becomes a MISSING Transaction or
 * a RowError; a bad row never stops the rows after it.
 */

import type { Transaction, LedgerParseResult, RowError } from '../types/index.js';
import { LEDGER_COLUMNS, TransactionSchema } from '../types/index.js';
import { createTransaction } from '../model/transaction.js';
import { parseDateValue, formatIsoDate } from '../utils/date-parse.js';
import { parseAmount, canonicalAmount } from '../utils/amount.js';
import { stripBom, cellText, trimTrailingEmpty } from '../utils/csv.js';

/**
 * Turn rows of cells into transactions.
 * Blank rows are dropped before numbering, so `row` counts non-blank rows.
 *
 * @param rows - Cells per row, in file order
 * @param sourceFile - Source filename, used in error messages
 */
export function rowsToLedger(rows: readonly (readonly unknown[])[], sourceFile: string): LedgerParseResult {
    const transactions: Transaction[] = [];
    const errors: RowError[] = [];

    const nonBlank = rows.filter(cells => cells.some(cell => cellText(cell) !== ''));

    nonBlank.forEach((cells, i) => {
        const row = i + 1;
        const result = parseRow(cells);
        if (typeof result === 'string') {
            errors.push({ row, message: `${sourceFile}: row ${row}: ${result}` });
            return;
        }

        // Validate against schema (runtime check)
        const checked = TransactionSchema.safeParse(result);
        if (!checked.success) {
            const issues = checked.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            errors.push({ row, message: `${sourceFile}: row ${row}: ${issues.join('; ')}` });
            return;
        }
        transactions.push(checked.data);
    });

    return { transactions, errors, skippedRows: errors.length };
}

/**
 * Build a Transaction from one row, or describe why it cannot be built.
 */
function parseRow(rawCells: readonly unknown[]): Transaction | string {
    const cells = trimTrailingEmpty(rawCells);
    if (cells.length !== LEDGER_COLUMNS.COUNT) {
        return `expected ${LEDGER_COLUMNS.COUNT} columns (date, department, amount, counterpart), found ${cells.length}`;
    }

    const dateValue = cells[LEDGER_COLUMNS.DATE];
    const date = parseDateValue(typeof dateValue === 'string' ? stripBom(dateValue) : dateValue);
    if (!date) {
        return `invalid date "${cellText(dateValue)}", expected YYYY-MM-DD`;
    }

    const amountValue = cells[LEDGER_COLUMNS.AMOUNT];
    const amount = parseAmount(amountValue);
    if (!amount) {
        return `invalid amount "${cellText(amountValue)}"`;
    }

    const department = cellText(cells[LEDGER_COLUMNS.DEPARTMENT]);
    if (!department) {
        return 'missing department';
    }

    // Non-empty: trimTrailingEmpty would have dropped a blank last cell
    const counterpart = cellText(cells[LEDGER_COLUMNS.COUNTERPART]);

    return createTransaction({
        date: formatIsoDate(date),
        department,
        counterpart,
        value: canonicalAmount(amount),
    });
}
