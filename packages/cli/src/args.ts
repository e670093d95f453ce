import { parseArgs } from 'node:util';
import { OutputFormatSchema } from '@ledger-reconcile/shared';
import type { ReconcileOptions } from './types.js';

export const CLI_VERSION = '1.0.0';

export const USAGE = [
    'Usage: ledger-reconcile [options] <ledger-a> <ledger-b>',
    '',
    'Reconciles two ledgers (CSV or XLSX, columns: date, department, amount, counterpart)',
    'and prints every transaction of both with its status, FOUND or MISSING.',
    '',
    'Options:',
    '  -f, --format <text|json>  Output format (default: text)',
    '  -s, --summary             Append a summary line to text output',
    '  -c, --config <path>       Config file (default: nearest reconcile.config.yaml)',
    '      --check               Exit with code 2 if any transaction is MISSING',
    '  -v, --verbose             Print progress to stderr',
    '  -h, --help                Show this help',
    '      --version             Show version',
    '',
    'Example:',
    '  ledger-reconcile transactions1.csv transactions2.csv',
].join('\n');

export type CliCommand =
    | { kind: 'help' }
    | { kind: 'version' }
    | { kind: 'reconcile'; fileA: string; fileB: string; options: ReconcileOptions }
    | { kind: 'error'; message: string };

function readArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            format: { type: 'string', short: 'f' },
            summary: { type: 'boolean', short: 's' },
            config: { type: 'string', short: 'c' },
            check: { type: 'boolean' },
            verbose: { type: 'boolean', short: 'v' },
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean' },
        },
    });
}

/**
 * Interpret command-line arguments (without node and script path).
 */
export function parseCliArgs(argv: string[]): CliCommand {
    let parsed: ReturnType<typeof readArgs>;
    try {
        parsed = readArgs(argv);
    } catch (err) {
        // Unknown options and missing option values
        return { kind: 'error', message: err instanceof Error ? err.message : String(err) };
    }

    const { values, positionals } = parsed;

    if (values.help) return { kind: 'help' };
    if (values.version) return { kind: 'version' };

    if (positionals.length !== 2) {
        return {
            kind: 'error',
            message: `Expected exactly 2 ledger files, got ${positionals.length}`,
        };
    }

    let format: ReconcileOptions['format'];
    if (values.format !== undefined) {
        const checked = OutputFormatSchema.safeParse(values.format);
        if (!checked.success) {
            return { kind: 'error', message: `Invalid format "${values.format}". Use text or json.` };
        }
        format = checked.data;
    }

    return {
        kind: 'reconcile',
        fileA: positionals[0],
        fileB: positionals[1],
        options: {
            format,
            summary: values.summary ?? false,
            check: values.check ?? false,
            verbose: values.verbose ?? false,
            config: values.config,
        },
    };
}
