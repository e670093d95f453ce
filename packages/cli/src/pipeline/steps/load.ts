import { readFile } from 'node:fs/promises';
import { detectLedgerParser, getSupportedParsers } from '@ledger-reconcile/core';
import type { PipelineState, PipelineStep } from '../types.js';
import type { LedgerFile } from '../../types.js';

/**
 * Step 1: Load Ledgers
 * Reads both files and parses them into transactions.
 * Any unreadable file or rejected row is fatal: the matcher only ever
 * sees fully valid ledgers.
 */
export const loadLedgers: PipelineStep = async (state) => {
    for (const file of [state.files.a, state.files.b]) {
        const transactions = await loadLedger(file, state);
        if (transactions.length === 0 && !state.errors.some(e => e.fatal)) {
            state.warnings.push(`[${file.filename}] No transactions found.`);
        }
        state.ledgers[file.side] = transactions;
    }

    return state;
};

async function loadLedger(file: LedgerFile, state: PipelineState) {
    const detection = detectLedgerParser(file.filename);
    if (!detection) {
        state.errors.push({
            step: 'load',
            message: `Unsupported ledger file: ${file.filename} (supported: ${getSupportedParsers().join(', ')})`,
            fatal: true,
        });
        return [];
    }

    let buffer: Buffer;
    try {
        buffer = await readFile(file.path);
    } catch (err) {
        state.errors.push({
            step: 'load',
            message: `Failed to read ${file.path}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
        return [];
    }

    try {
        const result = detection.parser(toArrayBuffer(buffer), file.filename);

        // Row errors are reported one by one, so every bad row shows up in a single run
        for (const rowError of result.errors) {
            state.errors.push({ step: 'load', message: rowError.message, fatal: true });
        }
        return result.transactions;
    } catch (err) {
        state.errors.push({
            step: 'load',
            message: `Failed to parse ${file.filename}: ${err instanceof Error ? err.message : String(err)}`,
            fatal: true,
            error: err,
        });
        return [];
    }
}

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
    const copy = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(copy).set(buffer);
    return copy;
}
