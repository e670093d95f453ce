/**
 * Constants for the ledger reconciler.
 */

/**
 * Reconciliation status of a single ledger entry.
 * MISSING -> FOUND is the only transition; FOUND is terminal.
 */
export const TRANSACTION_STATUS = {
    MISSING: 'MISSING',
    FOUND: 'FOUND',
} as const;

/**
 * Matching configuration.
 * Dates may differ by at most one calendar day, in either direction.
 * Department, counterpart and amount must be exactly equal.
 */
export const MATCHING_CONFIG = {
    DATE_TOLERANCE_DAYS: 1,
} as const;

/**
 * Column order of a ledger CSV row.
 */
export const LEDGER_COLUMNS = {
    DATE: 0,
    DEPARTMENT: 1,
    AMOUNT: 2,
    COUNTERPART: 3,
    COUNT: 4,
} as const;

/**
 * Fixed-width text report layout.
 */
export const REPORT_LAYOUT = {
    COLUMN_WIDTH: 12,
    AMOUNT_WIDTH: 4,
    AMOUNT_DECIMALS: 2,
    STATUS_WIDTH: 8,
    MIN_COLUMN_WIDTH: 4,
    MAX_COLUMN_WIDTH: 64,
} as const;

/**
 * Defaults applied when no config file sets them.
 */
export const CONFIG_DEFAULTS = {
    FILENAME: 'reconcile.config.yaml',
    FORMAT: 'text',
    SUMMARY: false,
    LABEL_A: 'Transactions A',
    LABEL_B: 'Transactions B',
} as const;
