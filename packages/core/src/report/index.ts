export { formatTransaction, renderTextReport, renderJsonReport } from './render.js';
export type { TextReportOptions } from './render.js';
