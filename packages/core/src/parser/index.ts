export { parseLedgerCsv } from './csv-ledger.js';
export { parseLedgerWorkbook } from './workbook-ledger.js';
export { rowsToLedger } from './rows.js';
export { detectLedgerParser, getSupportedParsers } from './detect.js';
export type { LedgerParserFn, LedgerParserDetection } from './detect.js';
