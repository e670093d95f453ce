/**
 * CSV cell utilities.
 */

/**
 * Strip UTF-8 Byte Order Mark (BOM) from a string if present.
 * A BOM left on the first cell would make the first date unparseable.
 */
export function stripBom(value: string): string {
    if (value.startsWith('\uFEFF')) {
        return value.slice(1);
    }
    return value;
}

/**
 * Cell value as trimmed text. Blank cells come back as ''.
 */
export function cellText(value: unknown): string {
    if (value === null || value === undefined) return '';
    return String(value).trim();
}

/**
 * Drop trailing empty cells (a trailing comma on a line yields one).
 */
export function trimTrailingEmpty(cells: readonly unknown[]): unknown[] {
    let end = cells.length;
    while (end > 0 && cellText(cells[end - 1]) === '') {
        end--;
    }
    return cells.slice(0, end);
}
