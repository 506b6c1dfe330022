/**
 * @file History Record Schemas
 *
 * Zod schemas for caller input (artifact names, tag labels, metrics) and
 * for the JSON records persisted per artifact. Input failures raise
 * InvalidInputError; a stored record that fails its schema raises
 * IntegrityViolationError.
 *
 * @module history/schemas
 */

import { z } from 'zod';
import { fieldName_isReserved } from '../query/fields.js';

// ─── Input ──────────────────────────────────────────────────────

export const ArtifactNameSchema = z
    .string()
    .regex(
        /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/,
        'artifact name must start with a letter or digit and contain only letters, digits, ".", "_" or "-" (max 128)',
    );

export const TagLabelSchema = z
    .string()
    .min(1, 'tag label is required')
    .max(128, 'tag label is limited to 128 characters')
    .regex(/\S/, 'tag label must not be blank');

export const MetricNameSchema = z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'metric name must be an identifier')
    .refine((name: string): boolean => !fieldName_isReserved(name), {
        message: 'metric name collides with a built-in query field or keyword',
    });

export const MetricValueSchema = z.number().finite('metric value must be a finite number');

export const SequenceSchema = z.number().int('sequence must be an integer');

// ─── Stored Records ─────────────────────────────────────────────

export const VersionRecordSchema = z.object({
    artifact:    ArtifactNameSchema,
    sequence:    z.number().int().positive(),
    fingerprint: z.string().regex(/^[a-z0-9]{3,128}$/),
    variables:   z.record(z.string(), z.string().nullable()).default({}),
    author:      z.string(),
    message:     z.string(),
    createdAt:   z.string().datetime(),
    tags:        z.array(z.string()).default([]),
    metrics:     z.record(z.string(), z.number()).default({}),
});

export const HeadRecordSchema = z.object({
    sequence: z.number().int().positive(),
});

export type VersionRecord = z.infer<typeof VersionRecordSchema>;
export type HeadRecord = z.infer<typeof HeadRecordSchema>;
