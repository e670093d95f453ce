import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { CONFIG_DEFAULTS } from '@ledger-reconcile/shared';

/**
 * Searches for reconcile.config.yaml.
 * Starts at startPath and bubbles up to the root.
 *
 * @returns Path of the nearest config file, or null
 */
export function detectConfigFile(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, CONFIG_DEFAULTS.FILENAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
