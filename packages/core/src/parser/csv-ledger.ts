/**
 * Ledger CSV parser.
 *
 * Format:
 * - Headerless CSV, one transaction per line
 * - Columns: date (YYYY-MM-DD), department, amount, counterpart
 * - Amount is a plain decimal; quoted thousands commas are tolerated
 *
 * ARCHITECTURAL NOTE: No console.* calls and no file access. The caller
 * reads the file; row problems come back in LedgerParseResult.errors.
 */

import { parse } from 'csv-parse/sync';
import type { LedgerParseResult } from '../types/index.js';
import { stripBom } from '../utils/csv.js';
import { rowsToLedger } from './rows.js';

const utf8 = new TextDecoder('utf-8');

/**
 * Parse a ledger CSV export.
 *
 * @param data - File contents as ArrayBuffer (decoded as UTF-8) or text
 * @param sourceFile - Source filename for error messages
 * @returns Transactions in row order (all MISSING), row errors and skip count
 * @throws Error when the text is not CSV at all (e.g. an unclosed quote)
 */
export function parseLedgerCsv(data: ArrayBuffer | string, sourceFile: string): LedgerParseResult {
    const text = stripBom(typeof data === 'string' ? data : utf8.decode(data));
    if (text.trim() === '') {
        return { transactions: [], errors: [], skippedRows: 0 };
    }

    let parsed: unknown;
    try {
        parsed = parse(text, {
            skip_empty_lines: true,
            relax_column_count: true,
            trim: true,
        });
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`malformed CSV: ${reason}`);
    }

    const rows = Array.isArray(parsed) ? parsed.filter(isRow) : [];
    return rowsToLedger(rows, sourceFile);
}

function isRow(value: unknown): value is unknown[] {
    return Array.isArray(value);
}
