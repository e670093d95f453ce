import type { Transaction, ReconcileResult, ReconcileConfig } from '@ledger-reconcile/shared';
import type { LedgerFile, ReconcileOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the reconciliation pipeline.
 */
export interface PipelineState {
    files: { a: LedgerFile; b: LedgerFile };
    config: ReconcileConfig;
    options: ReconcileOptions;

    // Accumulated during pipeline execution
    ledgers: { a: Transaction[]; b: Transaction[] };
    result?: ReconcileResult;
    output: string[];

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
