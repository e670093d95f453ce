import { describe, it, expect } from 'vitest';
import { reconcileLedgers, summarize } from '../../src/matcher/reconcile.js';
import type { Transaction } from '@ledger-reconcile/shared';

// Helper to create minimal Transaction
function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
    return {
        date: '2020-12-04',
        department: 'Tecnologia',
        counterpart: 'Bitbucket',
        value: '16',
        status: 'MISSING',
        ...overrides,
    };
}

function statuses(ledger: readonly Transaction[]): string[] {
    return ledger.map(t => t.status);
}

function countFound(ledger: readonly Transaction[]): number {
    return ledger.filter(t => t.status === 'FOUND').length;
}

describe('reconcileLedgers', () => {
    describe('empty ledgers', () => {
        it('returns empty outputs for two empty ledgers', () => {
            const result = reconcileLedgers([], []);
            expect(result.ledgerA).toHaveLength(0);
            expect(result.ledgerB).toHaveLength(0);
            expect(result.matches).toHaveLength(0);
        });

        it('leaves every record MISSING when the other ledger is empty', () => {
            const left = reconcileLedgers([makeTxn()], []);
            expect(statuses(left.ledgerA)).toEqual(['MISSING']);
            expect(left.ledgerB).toHaveLength(0);

            const right = reconcileLedgers([], [makeTxn()]);
            expect(statuses(right.ledgerB)).toEqual(['MISSING']);
            expect(right.ledgerA).toHaveLength(0);
        });
    });

    describe('date tolerance', () => {
        it('matches exact records', () => {
            const result = reconcileLedgers([makeTxn()], [makeTxn()]);
            expect([result.ledgerA[0].status, result.ledgerB[0].status]).toEqual(['FOUND', 'FOUND']);
        });

        it('matches one day before, in both directions', () => {
            const r1 = reconcileLedgers([makeTxn()], [makeTxn({ date: '2020-12-03' })]);
            expect([r1.ledgerA[0].status, r1.ledgerB[0].status]).toEqual(['FOUND', 'FOUND']);

            const r2 = reconcileLedgers([makeTxn({ date: '2020-12-03' })], [makeTxn()]);
            expect([r2.ledgerA[0].status, r2.ledgerB[0].status]).toEqual(['FOUND', 'FOUND']);
        });

        it('matches one day after, in both directions', () => {
            const r1 = reconcileLedgers([makeTxn()], [makeTxn({ date: '2020-12-05' })]);
            expect([r1.ledgerA[0].status, r1.ledgerB[0].status]).toEqual(['FOUND', 'FOUND']);

            const r2 = reconcileLedgers([makeTxn({ date: '2020-12-05' })], [makeTxn()]);
            expect([r2.ledgerA[0].status, r2.ledgerB[0].status]).toEqual(['FOUND', 'FOUND']);
        });

        it('does not match two days apart', () => {
            const r1 = reconcileLedgers([makeTxn({ date: '2020-12-06' })], [makeTxn()]);
            expect([r1.ledgerA[0].status, r1.ledgerB[0].status]).toEqual(['MISSING', 'MISSING']);

            const r2 = reconcileLedgers([makeTxn()], [makeTxn({ date: '2020-12-06' })]);
            expect([r2.ledgerA[0].status, r2.ledgerB[0].status]).toEqual(['MISSING', 'MISSING']);
        });

        it('records the date difference of each pair', () => {
            const result = reconcileLedgers([makeTxn({ date: '2020-12-05' })], [makeTxn()]);
            expect(result.matches).toEqual([{ index_a: 0, index_b: 0, date_diff_days: 1 }]);
        });
    });

    describe('exact fields', () => {
        const changes: Array<[string, Partial<Transaction>]> = [
            ['department', { department: 'Jurídico' }],
            ['counterpart', { counterpart: 'AWS' }],
            ['value', { value: '16.01' }],
        ];

        it.each(changes)('does not match when %s differs', (_field, change) => {
            const r1 = reconcileLedgers([makeTxn(change)], [makeTxn()]);
            expect([r1.ledgerA[0].status, r1.ledgerB[0].status]).toEqual(['MISSING', 'MISSING']);

            const r2 = reconcileLedgers([makeTxn()], [makeTxn(change)]);
            expect([r2.ledgerA[0].status, r2.ledgerB[0].status]).toEqual(['MISSING', 'MISSING']);
        });

        it('matches amounts written with different scale', () => {
            const result = reconcileLedgers([makeTxn({ value: '16.00' })], [makeTxn({ value: '16.0' })]);
            expect([result.ledgerA[0].status, result.ledgerB[0].status]).toEqual(['FOUND', 'FOUND']);
        });
    });

    describe('duplicates', () => {
        it('matches only the first of two duplicates in ledger A', () => {
            const result = reconcileLedgers([makeTxn(), makeTxn()], [makeTxn()]);
            expect(statuses(result.ledgerA)).toEqual(['FOUND', 'MISSING']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND']);
        });

        it('matches only the first of two duplicates in ledger B', () => {
            const result = reconcileLedgers([makeTxn()], [makeTxn(), makeTxn()]);
            expect(statuses(result.ledgerA)).toEqual(['FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'MISSING']);
        });

        it('pairs min(count_A, count_B) records of a cluster', () => {
            const result = reconcileLedgers(
                [makeTxn(), makeTxn({ date: '2020-12-05' }), makeTxn({ date: '2020-12-03' })],
                [makeTxn(), makeTxn()]
            );
            expect(countFound(result.ledgerA)).toBe(2);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'FOUND']);
            // earliest two of ledger A are claimed, in date order
            expect(statuses(result.ledgerA)).toEqual(['FOUND', 'MISSING', 'FOUND']);
            expect(result.matches.map(m => m.index_a)).toEqual([2, 0]);
        });
    });

    describe('earliest date first', () => {
        it('prefers the earlier ledger A record', () => {
            const result = reconcileLedgers(
                [makeTxn(), makeTxn({ date: '2020-12-03' })],
                [makeTxn()]
            );
            expect(statuses(result.ledgerA)).toEqual(['MISSING', 'FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND']);
        });

        it('lets the first ledger B record win regardless of its date', () => {
            const result = reconcileLedgers(
                [makeTxn()],
                [makeTxn(), makeTxn({ date: '2020-12-03' })]
            );
            expect(statuses(result.ledgerA)).toEqual(['FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'MISSING']);
        });

        it('falls through to a later candidate when the earliest is out of range', () => {
            const result = reconcileLedgers(
                [makeTxn({ date: '2020-12-01' }), makeTxn({ date: '2020-12-05' })],
                [makeTxn()]
            );
            expect(statuses(result.ledgerA)).toEqual(['MISSING', 'FOUND']);
        });

        it('leaves a later record free for a later ledger B entry', () => {
            const result = reconcileLedgers(
                [makeTxn({ date: '2020-12-04' }), makeTxn({ date: '2020-12-06' })],
                [makeTxn({ date: '2020-12-05' }), makeTxn({ date: '2020-12-07' })]
            );
            expect(statuses(result.ledgerA)).toEqual(['FOUND', 'FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'FOUND']);
            expect(result.matches).toEqual([
                { index_a: 0, index_b: 0, date_diff_days: 1 },
                { index_a: 1, index_b: 1, date_diff_days: 1 },
            ]);
        });
    });

    describe('incremental runs', () => {
        it('never rematches or unmatches records that arrive FOUND', () => {
            const result = reconcileLedgers(
                [makeTxn({ status: 'FOUND' }), makeTxn()],
                [makeTxn({ status: 'FOUND' }), makeTxn()]
            );
            expect(statuses(result.ledgerA)).toEqual(['FOUND', 'FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'FOUND']);
            expect(result.matches).toEqual([{ index_a: 1, index_b: 1, date_diff_days: 0 }]);
        });

        it('leaves a MISSING record unmatched when its only partner arrived FOUND', () => {
            const result = reconcileLedgers([makeTxn({ status: 'FOUND' })], [makeTxn()]);
            expect(statuses(result.ledgerA)).toEqual(['FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['MISSING']);
            expect(result.matches).toHaveLength(0);
        });
    });

    describe('purity', () => {
        it('does not mutate the input ledgers', () => {
            const ledgerA = [makeTxn()];
            const ledgerB = [makeTxn()];
            const result = reconcileLedgers(ledgerA, ledgerB);

            expect(ledgerA[0].status).toBe('MISSING');
            expect(ledgerB[0].status).toBe('MISSING');
            expect(result.ledgerA[0]).not.toBe(ledgerA[0]);
        });

        it('preserves order, length and non-status fields', () => {
            const ledgerA = [
                makeTxn({ counterpart: 'AWS', value: '50', date: '2020-12-05' }),
                makeTxn(),
            ];
            const result = reconcileLedgers(ledgerA, [makeTxn()]);

            expect(result.ledgerA).toEqual([
                { ...ledgerA[0], status: 'MISSING' },
                { ...ledgerA[1], status: 'FOUND' },
            ]);
        });
    });

    describe('bijection', () => {
        it('finds as many records in A as in B', () => {
            const ledgerA = [
                makeTxn(),
                makeTxn(),
                makeTxn({ date: '2020-12-06' }),
                makeTxn({ counterpart: 'AWS' }),
                makeTxn({ value: '20' }),
            ];
            const ledgerB = [
                makeTxn({ date: '2020-12-05' }),
                makeTxn({ date: '2020-12-05' }),
                makeTxn({ date: '2020-12-05' }),
                makeTxn({ counterpart: 'AWS', date: '2020-12-02' }),
                makeTxn({ value: '20' }),
                makeTxn({ value: '20' }),
            ];
            const result = reconcileLedgers(ledgerA, ledgerB);

            expect(countFound(result.ledgerA)).toBe(countFound(result.ledgerB));
            expect(countFound(result.ledgerA)).toBe(result.matches.length);

            const usedA = new Set(result.matches.map(m => m.index_a));
            const usedB = new Set(result.matches.map(m => m.index_b));
            expect(usedA.size).toBe(result.matches.length);
            expect(usedB.size).toBe(result.matches.length);
        });
    });

    describe('worked examples', () => {
        it('reconciles the three-row example', () => {
            const ledgerA = [
                makeTxn({ date: '2020-12-04', department: 'Tecnologia', counterpart: 'Bitbucket', value: '16.00' }),
                makeTxn({ date: '2020-12-04', department: 'Jurídico', counterpart: 'LinkSquares', value: '60.00' }),
                makeTxn({ date: '2020-12-05', department: 'Tecnologia', counterpart: 'AWS', value: '50.00' }),
            ];
            const ledgerB = [
                makeTxn({ date: '2020-12-04', department: 'Tecnologia', counterpart: 'Bitbucket', value: '16.00' }),
                makeTxn({ date: '2020-12-05', department: 'Tecnologia', counterpart: 'AWS', value: '49.99' }),
                makeTxn({ date: '2020-12-04', department: 'Jurídico', counterpart: 'LinkSquares', value: '60.00' }),
            ];

            const result = reconcileLedgers(ledgerA, ledgerB);

            expect(statuses(result.ledgerA)).toEqual(['FOUND', 'FOUND', 'MISSING']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'MISSING', 'FOUND']);
            expect(result.matches).toEqual([
                { index_a: 0, index_b: 0, date_diff_days: 0 },
                { index_a: 1, index_b: 2, date_diff_days: 0 },
            ]);
        });

        it('reconciles duplicated entries one day apart', () => {
            const ledgerA = [
                makeTxn({ date: '2020-12-04', counterpart: 'Bitbucket', value: '16.0' }),
                makeTxn({ date: '2020-12-04', department: 'Jurídico', counterpart: 'LinkSquares', value: '60.0' }),
                makeTxn({ date: '2020-12-05', counterpart: 'AWS', value: '50.0' }),
                makeTxn({ date: '2020-12-05', counterpart: 'Datadog', value: '10.0' }),
            ];
            const ledgerB = [
                makeTxn({ date: '2020-12-04', counterpart: 'Bitbucket', value: '16.0' }),
                makeTxn({ date: '2020-12-05', counterpart: 'AWS', value: '49.99' }),
                makeTxn({ date: '2020-12-04', department: 'Jurídico', counterpart: 'LinkSquares', value: '60.0' }),
                makeTxn({ date: '2020-12-06', counterpart: 'Datadog', value: '10.0' }),
                makeTxn({ date: '2020-12-06', counterpart: 'Datadog', value: '10.0' }),
            ];

            const result = reconcileLedgers(ledgerA, ledgerB);

            expect(statuses(result.ledgerA)).toEqual(['FOUND', 'FOUND', 'MISSING', 'FOUND']);
            expect(statuses(result.ledgerB)).toEqual(['FOUND', 'MISSING', 'FOUND', 'FOUND', 'MISSING']);
            expect(result.stats).toEqual({
                total_a: 4,
                total_b: 5,
                found_a: 3,
                found_b: 3,
                missing_a: 1,
                missing_b: 2,
                matches: 3,
            });
        });
    });
});

describe('summarize', () => {
    it('counts FOUND records including ones found by an earlier run', () => {
        const stats = summarize(
            [makeTxn({ status: 'FOUND' }), makeTxn()],
            [makeTxn({ status: 'FOUND' })],
            []
        );
        expect(stats).toEqual({
            total_a: 2,
            total_b: 1,
            found_a: 1,
            found_b: 1,
            missing_a: 1,
            missing_b: 0,
            matches: 0,
        });
    });
});
