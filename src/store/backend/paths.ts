/**
 * @file Storage Path Utilities
 *
 * @module store/backend
 */

import { InvalidInputError } from '../../core/errors.js';

/**
 * Normalize a storage path: strip leading/trailing slashes, collapse
 * repeats, reject `.` and `..` segments.
 *
 * @throws {InvalidInputError} On a traversal segment
 */
export function path_normalize(path: string): string {
    const segments: string[] = path.split('/').filter((segment: string): boolean => segment.length > 0);
    for (const segment of segments) {
        if (segment === '.' || segment === '..') {
            throw new InvalidInputError(`Storage path '${path}' may not contain '${segment}' segments`);
        }
    }
    return segments.join('/');
}
