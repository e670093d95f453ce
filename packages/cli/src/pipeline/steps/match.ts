import { reconcileLedgers } from '@ledger-reconcile/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 2: Reconciliation
 * Pairs ledger B records with ledger A records (core, pure).
 */
export const matchLedgers: PipelineStep = async (state) => {
    state.result = reconcileLedgers(state.ledgers.a, state.ledgers.b);
    return state;
};
