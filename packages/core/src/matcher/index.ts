/**
 * Matcher module: one-to-one reconciliation of two ledgers.
 */

export { reconcileLedgers, summarize } from './reconcile.js';
export { buildGroupIndex } from './group-index.js';
export { findEarliestMatch } from './find-earliest-match.js';
export { calendarDaysBetween, isWithinDateTolerance } from './calendar-days.js';
export type { GroupIndex } from './types.js';
