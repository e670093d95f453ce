import type { Transaction } from '../types/index.js';
import { groupingKey } from '../model/transaction.js';
import type { GroupIndex } from './types.js';

/**
 * Index a ledger by grouping key.
 *
 * Groups hold positions, not records, so status is always read from and
 * written to the ledger itself. Each group is sorted once here by date
 * ascending; Array.prototype.sort is stable, so equal dates keep ledger
 * order. Dates never change during a run, so this is the same order a
 * per-lookup sort would give.
 */
export function buildGroupIndex(ledger: readonly Transaction[]): GroupIndex {
    const index: GroupIndex = new Map();

    ledger.forEach((txn, position) => {
        const key = groupingKey(txn);
        const group = index.get(key);
        if (group) {
            group.push(position);
        } else {
            index.set(key, [position]);
        }
    });

    for (const group of index.values()) {
        // ISO dates compare correctly as strings
        group.sort((p, q) => compareIsoDates(ledger[p].date, ledger[q].date));
    }

    return index;
}

function compareIsoDates(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
