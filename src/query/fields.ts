/**
 * @file Query Fields
 *
 * Maps field names in a query to typed values on a version. Names that are
 * not built-in attributes are looked up as metrics; `metrics.<name>` is an
 * explicit alias for the same lookup.
 *
 * @module query/fields
 */

import { semanticDiff_categories } from '../diff/types.js';
import type { QueryTarget } from './types.js';

export type FieldValue =
    | { kind: 'number'; value: number }
    | { kind: 'string'; value: string }
    | { kind: 'date'; value: number }
    | { kind: 'list'; value: readonly string[] };

export const SEQUENCE_FIELDS: readonly string[] = ['sequence', 'version', 'version_number'];

export const BUILTIN_FIELDS: readonly string[] = [
    ...SEQUENCE_FIELDS,
    'artifact',
    'author',
    'message',
    'fingerprint',
    'created_at',
    'tags',
    'variables',
    'content',
    'changes',
];

export const CONTENT_FIELD: string = 'content';
export const CHANGES_FIELD: string = 'changes';

const METRIC_PREFIX: string = 'metrics.';

/** Whether `name` is unavailable as a metric name because a field or keyword claims it. */
export function fieldName_isReserved(name: string): boolean {
    const lower: string = name.toLowerCase();
    return BUILTIN_FIELDS.includes(name) || ['and', 'or', 'not', 'contains'].includes(lower) || name.startsWith(METRIC_PREFIX);
}

/**
 * Resolve a field against a target.
 *
 * @returns The typed value, or null when the version has no such field
 */
export function field_resolve(name: string, target: QueryTarget): FieldValue | null {
    const { version } = target;

    if (SEQUENCE_FIELDS.includes(name)) {
        return { kind: 'number', value: version.sequence };
    }

    switch (name) {
        case 'artifact':
            return { kind: 'string', value: version.artifact };
        case 'author':
            return { kind: 'string', value: version.author };
        case 'message':
            return { kind: 'string', value: version.message };
        case 'fingerprint':
            return { kind: 'string', value: version.fingerprint };
        case 'created_at':
            return { kind: 'date', value: Date.parse(version.createdAt) };
        case 'tags':
            return { kind: 'list', value: version.tags };
        case 'variables':
            return { kind: 'list', value: Object.keys(version.variables).sort() };
        case CONTENT_FIELD:
            return target.content === undefined ? null : { kind: 'string', value: target.content };
        case CHANGES_FIELD:
            return target.changes === undefined ? null : { kind: 'list', value: semanticDiff_categories(target.changes) };
    }

    const metric: string = name.startsWith(METRIC_PREFIX) ? name.slice(METRIC_PREFIX.length) : name;
    if (!Object.hasOwn(version.metrics, metric)) return null;
    return { kind: 'number', value: version.metrics[metric] };
}
