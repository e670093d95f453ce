/**
 * Formatted console output helpers.
 * Only `log` writes to stdout; everything else is a diagnostic on stderr,
 * so a JSON report can be piped.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.error(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.error(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.error(`→ ${message}`);
}

export function fail(message: string): void {
    console.error(`✖ ${message}`);
}
