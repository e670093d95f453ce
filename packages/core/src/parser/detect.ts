/**
 * Parser detection from filename extension.
 */

import type { LedgerParseResult } from '../types/index.js';
import { parseLedgerCsv } from './csv-ledger.js';
import { parseLedgerWorkbook } from './workbook-ledger.js';

/**
 * Parser function signature.
 * Takes ArrayBuffer (not file path) to keep core headless.
 */
export type LedgerParserFn = (data: ArrayBuffer, sourceFile: string) => LedgerParseResult;

interface ParserEntry {
    /** Regex pattern to match filename */
    pattern: RegExp;
    parser: LedgerParserFn;
}

const PARSERS: Record<string, ParserEntry> = {
    csv: {
        pattern: /\.(csv|txt)$/i,
        parser: parseLedgerCsv,
    },
    workbook: {
        pattern: /\.(xlsx|xls)$/i,
        parser: parseLedgerWorkbook,
    },
};

/**
 * Detection result returned by detectLedgerParser.
 */
export interface LedgerParserDetection {
    parser: LedgerParserFn;
    parserName: string;
}

/**
 * Pick a parser for a ledger file.
 *
 * @param filename - Base filename (not full path)
 * @returns Detection result or null if no parser matches
 */
export function detectLedgerParser(filename: string): LedgerParserDetection | null {
    for (const [name, { pattern, parser }] of Object.entries(PARSERS)) {
        if (pattern.test(filename)) {
            return { parser, parserName: name };
        }
    }
    return null;
}

/**
 * Get list of supported parser names.
 */
export function getSupportedParsers(): string[] {
    return Object.keys(PARSERS);
}
