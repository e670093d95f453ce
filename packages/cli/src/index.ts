#!/usr/bin/env node
/**
 * Ledger Reconcile CLI
 *
 * The CLI owns all file I/O and printing; @ledger-reconcile/core receives
 * ArrayBuffers and returns plain data.
 */

import { parseCliArgs, USAGE, CLI_VERSION } from './args.js';
import { reconcileFiles } from './commands/reconcile.js';
import { log, fail } from './utils/console.js';
import { EXIT_CODE, type ExitCode } from './types.js';

export async function main(argv: string[]): Promise<ExitCode> {
    const command = parseCliArgs(argv);

    switch (command.kind) {
        case 'help':
            log(USAGE);
            return EXIT_CODE.OK;
        case 'version':
            log(CLI_VERSION);
            return EXIT_CODE.OK;
        case 'error':
            fail(`Error: ${command.message}`);
            console.error('');
            console.error(USAGE);
            return EXIT_CODE.ERROR;
        case 'reconcile':
            return reconcileFiles(command.fileA, command.fileB, command.options);
    }
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        fail(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = EXIT_CODE.ERROR;
    });
