export { parseDateValue, parseIsoDate, excelSerialToDate, formatIsoDate } from './date-parse.js';
export { stripBom, cellText, trimTrailingEmpty } from './csv.js';
export { parseAmount, canonicalAmount, formatAmount } from './amount.js';
