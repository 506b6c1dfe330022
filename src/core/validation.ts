/**
 * @file Validation Helpers
 *
 * Thin wrappers over zod `safeParse` that turn issues into this library's
 * error types: caller input becomes InvalidInputError, stored records
 * become IntegrityViolationError.
 *
 * @module core/validation
 */

import type { z } from 'zod';
import { IntegrityViolationError, InvalidInputError } from './errors.js';

/** Flatten zod issues into one line per issue. */
export function issues_format(error: z.ZodError): string {
    return error.issues
        .map((issue: z.ZodIssue): string => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate caller input.
 *
 * @throws {InvalidInputError} Listing every issue, prefixed with `label`
 */
export function input_validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new InvalidInputError(`Invalid ${label}: ${issues_format(result.error)}`);
    }
    return result.data;
}

/**
 * Decode and validate a stored JSON record.
 *
 * @throws {IntegrityViolationError} If the text is not JSON or does not fit the schema
 */
export function record_decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string, path: string): T {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error: unknown) {
        const detail: string = error instanceof Error ? error.message : String(error);
        throw new IntegrityViolationError(`Corrupt record at ${path}: ${detail}`);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
        throw new IntegrityViolationError(`Invalid record at ${path}: ${issues_format(result.error)}`);
    }
    return result.data;
}
