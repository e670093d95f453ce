import { basename } from 'node:path';
import type { ReconcileConfig } from '@ledger-reconcile/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { loadLedgers } from './steps/load.js';
import { matchLedgers } from './steps/match.js';
import { renderReport } from './steps/report.js';
import type { ReconcileOptions } from '../types.js';
import { arrow, fail } from '../utils/console.js';

/**
 * Orchestrates the execution of the reconciliation pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    pathA: string,
    pathB: string,
    config: ReconcileConfig,
    options: ReconcileOptions
): Promise<PipelineState> {
    let state: PipelineState = {
        files: {
            a: { side: 'a', path: pathA, filename: basename(pathA) },
            b: { side: 'b', path: pathB, filename: basename(pathB) },
        },
        config,
        options,
        ledgers: { a: [], b: [] },
        output: [],
        warnings: [],
        errors: [],
    };

    const steps: { name: string; fn: PipelineStep }[] = [
        { name: 'Load Ledgers', fn: loadLedgers },
        { name: 'Reconciliation', fn: matchLedgers },
        { name: 'Report', fn: renderReport },
    ];

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (options.verbose) {
            arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);
        }

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            if (options.verbose) {
                fail(`Fatal error in step "${step.name}". Stopping.`);
            }
            break;
        }
    }

    return state;
}
