import type { Transaction, Match, ReconcileResult, ReconcileStats } from '../types/index.js';
import { TRANSACTION_STATUS } from '../types/index.js';
import { groupingKey, isFound } from '../model/transaction.js';
import { buildGroupIndex } from './group-index.js';
import { findEarliestMatch } from './find-earliest-match.js';
import { calendarDaysBetween } from './calendar-days.js';

/**
 * Reconcile two ledgers.
 *
 * PURE FUNCTION: Does not mutate its inputs. Both ledgers are copied and
 * the copies are annotated, in input order and at input length.
 *
 * One pass over `ledgerB`. For each record, the ledgerA group sharing its
 * grouping key is scanned in date order and the earliest compatible
 * record is claimed: both sides become FOUND. A claimed record is never
 * offered again, so the pairing is one-to-one and a duplicate cluster
 * yields min(count_A, count_B) pairs, earlier ledgerB records first.
 *
 * Records that arrive FOUND (an earlier partial run) keep their status
 * and take no part in new matches.
 *
 * @param ledgerA - Indexed ledger
 * @param ledgerB - Iterated ledger
 * @returns Annotated copies, the pairs made by this run and counts
 */
export function reconcileLedgers(
    ledgerA: readonly Transaction[],
    ledgerB: readonly Transaction[]
): ReconcileResult {
    const outA = ledgerA.map(txn => ({ ...txn }));
    const outB = ledgerB.map(txn => ({ ...txn }));
    const matches: Match[] = [];

    if (outA.length > 0 && outB.length > 0) {
        const index = buildGroupIndex(outA);

        outB.forEach((txnB, positionB) => {
            if (isFound(txnB)) return;

            const positionA = findEarliestMatch(txnB, index.get(groupingKey(txnB)), outA);
            if (positionA === null) return;

            const txnA = outA[positionA];
            txnA.status = TRANSACTION_STATUS.FOUND;
            txnB.status = TRANSACTION_STATUS.FOUND;
            matches.push({
                index_a: positionA,
                index_b: positionB,
                date_diff_days: calendarDaysBetween(txnA.date, txnB.date),
            });
        });
    }

    return {
        ledgerA: outA,
        ledgerB: outB,
        matches,
        stats: summarize(outA, outB, matches),
    };
}

/**
 * Count FOUND and MISSING records on both sides.
 */
export function summarize(
    ledgerA: readonly Transaction[],
    ledgerB: readonly Transaction[],
    matches: readonly Match[]
): ReconcileStats {
    const foundA = ledgerA.filter(isFound).length;
    const foundB = ledgerB.filter(isFound).length;

    return {
        total_a: ledgerA.length,
        total_b: ledgerB.length,
        found_a: foundA,
        found_b: foundB,
        missing_a: ledgerA.length - foundA,
        missing_b: ledgerB.length - foundB,
        matches: matches.length,
    };
}
