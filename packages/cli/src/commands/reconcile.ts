import { loadConfig, type LoadedConfig } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import { log, warn, fail, info, success } from '../utils/console.js';
import { EXIT_CODE, type ExitCode, type ReconcileOptions } from '../types.js';

/**
 * Reconciles two ledger files and prints the report to stdout.
 * Diagnostics go to stderr.
 */
export async function reconcileFiles(
    fileA: string,
    fileB: string,
    options: ReconcileOptions
): Promise<ExitCode> {
    let loaded: LoadedConfig;
    try {
        loaded = loadConfig(options.config);
    } catch (err) {
        fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
        return EXIT_CODE.ERROR;
    }

    if (options.verbose) {
        info(loaded.path ? `Config: ${loaded.path}` : 'Config: defaults');
    }

    const state = await runPipeline(fileA, fileB, loaded.config, options);

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            fail(`ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            return EXIT_CODE.ERROR;
        }
    }

    for (const line of state.output) {
        log(line);
    }

    const stats = state.result?.stats;
    if (stats && options.verbose) {
        success(`Reconciled ${stats.total_a} + ${stats.total_b} transactions, ${stats.matches} matched pairs.`);
    }

    if (options.check && stats && (stats.missing_a > 0 || stats.missing_b > 0)) {
        return EXIT_CODE.UNRECONCILED;
    }
    return EXIT_CODE.OK;
}
