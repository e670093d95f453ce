/**
 * Date parsing utilities for ledger rows.
 * All dates are handled as UTC midnight (00:00:00Z).
 */

const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Parse a date cell (ISO string or spreadsheet serial).
 * Returns date in UTC (00:00:00Z), or null when the value is not a calendar date.
 */
export function parseDateValue(value: unknown): Date | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? excelSerialToDate(value) : null;
    }
    if (typeof value === 'string') {
        return parseIsoDate(value.trim());
    }
    return null;
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * Rejects dates that roll over, e.g. 2021-02-30.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);
    if (year < 1) return null;

    // setUTCFullYear keeps years 0-99 literal; Date.UTC would map them to 19xx
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Convert spreadsheet serial date (days since 1899-12-30) to Date (UTC).
 * Fractional parts are rounded away; ledgers carry no time of day.
 */
export function excelSerialToDate(serial: number): Date {
    const days = Math.round(serial);
    return new Date((days - EXCEL_EPOCH_OFFSET_DAYS) * MS_PER_DAY);
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = String(date.getUTCFullYear()).padStart(4, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}
