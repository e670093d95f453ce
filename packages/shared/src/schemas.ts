/**
 * Zod schemas for reconciler data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { TRANSACTION_STATUS, REPORT_LAYOUT, CONFIG_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string format: YYYY-MM-DD
 */
const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format');

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

// ============================================================================
// Transaction Schema
// ============================================================================

export const TransactionStatusSchema = z.enum([
    TRANSACTION_STATUS.MISSING,
    TRANSACTION_STATUS.FOUND,
]);

export type TransactionStatus = z.infer<typeof TransactionStatusSchema>;

/**
 * One ledger entry. Only `status` changes during a reconciliation run.
 */
export const TransactionSchema = z.object({
    date: isoDateString,
    department: z.string().min(1),
    counterpart: z.string().min(1),
    value: decimalString,
    status: TransactionStatusSchema,
});

export type Transaction = z.infer<typeof TransactionSchema>;

// ============================================================================
// Parsing Schemas
// ============================================================================

/**
 * A rejected input row. `row` is 1-based, counted over non-blank lines.
 */
export const RowErrorSchema = z.object({
    row: z.number().int().min(1),
    message: z.string(),
});

export type RowError = z.infer<typeof RowErrorSchema>;

/**
 * Result of parsing one ledger file.
 */
export const LedgerParseResultSchema = z.object({
    transactions: z.array(TransactionSchema),
    errors: z.array(RowErrorSchema),
    skippedRows: z.number().int().min(0),
});

export type LedgerParseResult = z.infer<typeof LedgerParseResultSchema>;

// ============================================================================
// Reconciliation Schemas
// ============================================================================

/**
 * A pair made by one reconciliation run, as positions into both ledgers.
 */
export const MatchSchema = z.object({
    index_a: z.number().int().min(0),
    index_b: z.number().int().min(0),
    date_diff_days: z.number().int().min(0),
});

export type Match = z.infer<typeof MatchSchema>;

export const ReconcileStatsSchema = z.object({
    total_a: z.number().int().min(0),
    total_b: z.number().int().min(0),
    found_a: z.number().int().min(0),
    found_b: z.number().int().min(0),
    missing_a: z.number().int().min(0),
    missing_b: z.number().int().min(0),
    matches: z.number().int().min(0),
});

export type ReconcileStats = z.infer<typeof ReconcileStatsSchema>;

export const ReconcileResultSchema = z.object({
    ledgerA: z.array(TransactionSchema),
    ledgerB: z.array(TransactionSchema),
    matches: z.array(MatchSchema),
    stats: ReconcileStatsSchema,
});

export type ReconcileResult = z.infer<typeof ReconcileResultSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

export const OutputFormatSchema = z.enum(['text', 'json']);

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * reconcile.config.yaml. Every key is optional.
 */
export const ReconcileConfigSchema = z.object({
    output: z.object({
        format: OutputFormatSchema.default(CONFIG_DEFAULTS.FORMAT),
        summary: z.boolean().default(CONFIG_DEFAULTS.SUMMARY),
        columnWidth: z.number().int()
            .min(REPORT_LAYOUT.MIN_COLUMN_WIDTH)
            .max(REPORT_LAYOUT.MAX_COLUMN_WIDTH)
            .default(REPORT_LAYOUT.COLUMN_WIDTH),
    }).default({}),
    labels: z.object({
        a: z.string().min(1).default(CONFIG_DEFAULTS.LABEL_A),
        b: z.string().min(1).default(CONFIG_DEFAULTS.LABEL_B),
    }).default({}),
});

export type ReconcileConfig = z.infer<typeof ReconcileConfigSchema>;
