/**
 * Ledger workbook parser (.xlsx / .xls).
 *
 * Format:
 * - First sheet, no header row
 * - Columns A-D: date, department, amount, counterpart
 * - Date cells may be text (YYYY-MM-DD) or spreadsheet dates
 *
 * ARCHITECTURAL NOTE: No console.* calls. Takes an ArrayBuffer so the
 * core never touches the file system.
 */

import * as XLSX from 'xlsx';
import type { LedgerParseResult } from '../types/index.js';
import { rowsToLedger } from './rows.js';

/**
 * Parse a ledger workbook export.
 *
 * @param data - File contents as ArrayBuffer
 * @param sourceFile - Source filename for error messages
 * @returns Transactions in row order (all MISSING), row errors and skip count
 */
export function parseLedgerWorkbook(data: ArrayBuffer, sourceFile: string): LedgerParseResult {
    const workbook = XLSX.read(data, { type: 'array' });
    const firstSheet = workbook.SheetNames[0];
    if (firstSheet === undefined) {
        return { transactions: [], errors: [], skippedRows: 0 };
    }

    // Dates stay serial numbers here; rowsToLedger converts them in UTC
    const rows = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[firstSheet], {
        header: 1,
        raw: true,
        defval: '',
        blankrows: false,
    });

    return rowsToLedger(rows, sourceFile);
}
