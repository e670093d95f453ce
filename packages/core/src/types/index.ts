/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    Transaction,
    TransactionStatus,
    RowError,
    LedgerParseResult,
    Match,
    ReconcileStats,
    ReconcileResult,
    OutputFormat,
    ReconcileConfig,
} from '@ledger-reconcile/shared';

export {
    TransactionSchema,
    TRANSACTION_STATUS,
    MATCHING_CONFIG,
    LEDGER_COLUMNS,
    REPORT_LAYOUT,
    CONFIG_DEFAULTS,
} from '@ledger-reconcile/shared';
