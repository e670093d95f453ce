/**
 * Grouping index over one ledger: grouping key -> positions in that
 * ledger, each group ordered by date ascending, ties by position.
 */
export type GroupIndex = Map<string, number[]>;
