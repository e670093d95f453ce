// Types (re-exported from shared)
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
} from './types/index.js';

export {
    TransactionSchema,
    TRANSACTION_STATUS,
    MATCHING_CONFIG,
    LEDGER_COLUMNS,
    REPORT_LAYOUT,
    CONFIG_DEFAULTS,
} from './types/index.js';

// Utils
export { parseIsoDate, formatIsoDate, parseAmount, canonicalAmount } from './utils/index.js';

// Record model
export { createTransaction, groupingKey, isFound, isCompatible } from './model/index.js';
export type { TransactionFields } from './model/index.js';

// Matcher
export {
    reconcileLedgers,
    summarize,
    buildGroupIndex,
    findEarliestMatch,
    calendarDaysBetween,
    isWithinDateTolerance,
} from './matcher/index.js';
export type { GroupIndex } from './matcher/index.js';

// Parsers
export {
    parseLedgerCsv,
    parseLedgerWorkbook,
    rowsToLedger,
    detectLedgerParser,
    getSupportedParsers,
} from './parser/index.js';
export type { LedgerParserFn, LedgerParserDetection } from './parser/index.js';

// Report
export { formatTransaction, renderTextReport, renderJsonReport } from './report/index.js';
export type { TextReportOptions } from './report/index.js';
