import { renderTextReport, renderJsonReport } from '@ledger-reconcile/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 3: Report
 * Renders the result in the requested format. Command-line flags win
 * over the config file.
 */
export const renderReport: PipelineStep = async (state) => {
    if (!state.result) {
        state.errors.push({ step: 'report', message: 'Nothing to report: reconciliation did not run.', fatal: true });
        return state;
    }

    const format = state.options.format ?? state.config.output.format;

    if (format === 'json') {
        state.output = [renderJsonReport(state.result)];
    } else {
        state.output = renderTextReport(state.result, {
            labels: state.config.labels,
            summary: state.options.summary || state.config.output.summary,
            columnWidth: state.config.output.columnWidth,
        });
    }

    return state;
};
