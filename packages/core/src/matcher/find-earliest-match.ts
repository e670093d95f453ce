import type { Transaction } from '../types/index.js';
import { isCompatible } from '../model/transaction.js';

/**
 * Find the chronologically earliest still-unmatched record that can pair
 * with `txn`.
 *
 * `positions` must already be in date order (see buildGroupIndex); the
 * first compatible position wins.
 *
 * @param txn - Record from the iterated ledger
 * @param positions - Ordered candidate positions into `ledger`, or undefined when the key has no group
 * @param ledger - The indexed ledger
 * @returns Position of the match in `ledger`, or null
 */
export function findEarliestMatch(
    txn: Transaction,
    positions: readonly number[] | undefined,
    ledger: readonly Transaction[]
): number | null {
    if (!positions) return null;

    for (const position of positions) {
        if (isCompatible(ledger[position], txn)) {
            return position;
        }
    }

    return null;
}
