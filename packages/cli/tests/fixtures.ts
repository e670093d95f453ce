import { readFile } from 'node:fs/promises';
import { vi } from 'vitest';

export const LEDGER_A = [
    '2020-12-04,Tecnologia,16.00,Bitbucket',
    '2020-12-04,Jurídico,60.00,LinkSquares',
    '2020-12-05,Tecnologia,50.00,AWS',
].join('\n');

export const LEDGER_B = [
    '2020-12-04,Tecnologia,16.00,Bitbucket',
    '2020-12-05,Tecnologia,49.99,AWS',
    '2020-12-04,Jurídico,60.00,LinkSquares',
].join('\n');

export const TEXT_REPORT = [
    'Transactions A:',
    'Transaction: 2020-12-04 |   Tecnologia |    Bitbucket | 16.00 | Status:    FOUND',
    'Transaction: 2020-12-04 |     Jurídico |  LinkSquares | 60.00 | Status:    FOUND',
    'Transaction: 2020-12-05 |   Tecnologia |          AWS | 50.00 | Status:  MISSING',
    '',
    'Transactions B:',
    'Transaction: 2020-12-04 |   Tecnologia |    Bitbucket | 16.00 | Status:    FOUND',
    'Transaction: 2020-12-05 |   Tecnologia |          AWS | 49.99 | Status:  MISSING',
    'Transaction: 2020-12-04 |     Jurídico |  LinkSquares | 60.00 | Status:    FOUND',
];

/**
 * Serves the given contents from the mocked node:fs/promises readFile.
 * Unknown paths fail like a missing file.
 */
export function mockLedgerFiles(files: Record<string, string>): void {
    vi.mocked(readFile).mockImplementation(async (p) => {
        const content = files[String(p)];
        if (content === undefined) {
            throw new Error(`ENOENT: no such file or directory, open '${String(p)}'`);
        }
        return Buffer.from(content, 'utf-8');
    });
}
