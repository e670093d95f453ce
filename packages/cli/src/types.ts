/**
 * Ledger Reconcile CLI - Core Types
 */

import type { OutputFormat } from '@ledger-reconcile/shared';

export interface ReconcileOptions {
    /** Overrides output.format from the config file */
    format?: OutputFormat;
    summary: boolean;
    check: boolean;
    verbose: boolean;
    config?: string;
}

export type LedgerSide = 'a' | 'b';

export interface LedgerFile {
    side: LedgerSide;
    path: string;
    filename: string;
}

/**
 * Process exit codes.
 */
export const EXIT_CODE = {
    OK: 0,
    ERROR: 1,
    UNRECONCILED: 2,
} as const;

export type ExitCode = typeof EXIT_CODE[keyof typeof EXIT_CODE];
