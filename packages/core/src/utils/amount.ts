/**
 * Amount parsing. Money never passes through a JS number once it is text.
 */

import { Decimal } from 'decimal.js';

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

// Spreadsheets keep at most 15 significant digits
const SPREADSHEET_PRECISION = 15;

/**
 * Parse an amount cell into a Decimal.
 * Thousands separators (commas) are stripped. Returns null for anything
 * that is not a plain decimal, including exponents and currency symbols.
 *
 * Numeric cells are read at spreadsheet precision, so a formula result
 * such as 0.1 + 0.2 becomes 0.3 rather than its binary double.
 */
export function parseAmount(value: unknown): Decimal | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? new Decimal(value.toPrecision(SPREADSHEET_PRECISION)) : null;
    }
    if (typeof value !== 'string') return null;

    const clean = value.trim().replace(/,/g, '');
    if (!DECIMAL_PATTERN.test(clean)) return null;

    return new Decimal(clean);
}

/**
 * Canonical decimal string for storage and keys: no trailing zeros,
 * no exponent. '16.00' and '16.0' both become '16'.
 */
export function canonicalAmount(value: string | Decimal): string {
    return new Decimal(value).toFixed();
}

/**
 * Amount for display with a fixed number of fraction digits.
 */
export function formatAmount(value: string, decimals: number): string {
    return new Decimal(value).toFixed(decimals);
}
