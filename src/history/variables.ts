/**
 * @file Template Variables
 *
 * Scans blob text for `{{name}}` placeholders, optionally with a default
 * written as `{{name | default}}`. Names are reported in order of first
 * appearance; the first declared default for a name wins.
 *
 * @module history/variables
 */

const VARIABLE_PATTERN: RegExp = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*(?:\|\s*([^{}]*?)\s*)?\}\}/g;

export function variables_extract(content: string): Record<string, string | null> {
    const found: Map<string, string | null> = new Map();
    for (const match of content.matchAll(VARIABLE_PATTERN)) {
        const name: string = match[1];
        const fallback: string | null = match[2] === undefined ? null : match[2];
        const existing: string | null | undefined = found.get(name);
        if (existing === undefined || (existing === null && fallback !== null)) {
            found.set(name, fallback);
        }
    }
    return Object.fromEntries(found);
}
