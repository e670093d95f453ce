/**
 * Record model: construction, grouping key and the pairwise
 * compatibility predicate used by the matcher.
 */

import type { Transaction, TransactionStatus } from '../types/index.js';
import { TRANSACTION_STATUS, MATCHING_CONFIG } from '../types/index.js';
import { canonicalAmount } from '../utils/amount.js';
import { isWithinDateTolerance } from '../matcher/calendar-days.js';

/**
 * Already-validated fields of a ledger entry.
 */
export interface TransactionFields {
    date: string;
    department: string;
    counterpart: string;
    value: string;
    status?: TransactionStatus;
}

/**
 * Build a Transaction. Status defaults to MISSING.
 */
export function createTransaction(fields: TransactionFields): Transaction {
    return {
        date: fields.date,
        department: fields.department,
        counterpart: fields.counterpart,
        value: fields.value,
        status: fields.status ?? TRANSACTION_STATUS.MISSING,
    };
}

/**
 * Grouping key over (department, counterpart, value).
 *
 * Serialised as a JSON array so no department or counterpart text can
 * collide with another triple. The amount is canonicalised, so '16.0'
 * and '16.00' land in the same group.
 */
export function groupingKey(txn: Transaction): string {
    return JSON.stringify([txn.department, txn.counterpart, canonicalAmount(txn.value)]);
}

export function isFound(txn: Transaction): boolean {
    return txn.status === TRANSACTION_STATUS.FOUND;
}

/**
 * Checks whether two transactions can be paired.
 *
 * True iff neither side is FOUND yet, the grouping keys are equal and the
 * dates are at most one day apart (inclusive, either direction).
 * Reads status only; never changes it.
 */
export function isCompatible(a: Transaction, b: Transaction): boolean {
    // One-to-one: a FOUND record is already paired
    if (isFound(a) || isFound(b)) return false;

    if (groupingKey(a) !== groupingKey(b)) return false;

    return isWithinDateTolerance(a.date, b.date, MATCHING_CONFIG.DATE_TOLERANCE_DAYS);
}
