import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { ReconcileConfigSchema, type ReconcileConfig } from '@ledger-reconcile/shared';
import { detectConfigFile } from './detect.js';

export interface LoadedConfig {
    config: ReconcileConfig;
    /** File the config came from; null when only defaults apply */
    path: string | null;
}

/**
 * Loads reconcile.config.yaml.
 *
 * An explicit path must exist. Without one, the nearest config file above
 * startPath is used, and with none found every default applies.
 */
export function loadConfig(explicitPath?: string, startPath?: string): LoadedConfig {
    if (explicitPath !== undefined && !existsSync(explicitPath)) {
        throw new Error(`Config file not found: ${explicitPath}`);
    }

    const path = explicitPath ?? detectConfigFile(startPath);
    if (path === null) {
        return { config: ReconcileConfigSchema.parse({}), path: null };
    }

    return { config: parseConfig(readFileSync(path, 'utf-8'), path), path };
}

/**
 * Parses and validates config YAML. An empty document means all defaults.
 */
export function parseConfig(content: string, path: string): ReconcileConfig {
    let data: unknown;
    try {
        data = parse(content);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`Invalid YAML in ${path}: ${reason}`);
    }

    const result = ReconcileConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid config ${path}: ${issues.join('; ')}`);
    }
    return result.data;
}
