// Schemas
export {
    TransactionStatusSchema,
    TransactionSchema,
    RowErrorSchema,
    LedgerParseResultSchema,
    MatchSchema,
    ReconcileStatsSchema,
    ReconcileResultSchema,
    OutputFormatSchema,
    ReconcileConfigSchema,
} from './schemas.js';

// Types
export type {
    TransactionStatus,
    Transaction,
    RowError,
    LedgerParseResult,
    Match,
    ReconcileStats,
    ReconcileResult,
    OutputFormat,
    ReconcileConfig,
} from './schemas.js';

// Constants
export {
    TRANSACTION_STATUS,
    MATCHING_CONFIG,
    LEDGER_COLUMNS,
    REPORT_LAYOUT,
    CONFIG_DEFAULTS,
} from './constants.js';
