/**
 * @file Bisect State Schema
 *
 * @module bisect/schemas
 */

import { z } from 'zod';

const JudgmentSchema = z.object({
    sequence: z.number().int().positive(),
    verdict:  z.enum(['good', 'bad']),
    at:       z.string(),
});

export const BisectStateSchema = z
    .object({
        artifact:     z.string().min(1),
        sessionId:    z.string().min(1),
        status:       z.enum(['active', 'converged', 'abandoned']),
        low:          z.number().int().positive(),
        high:         z.number().int().positive(),
        current:      z.number().int().positive().nullable(),
        failingInput: z.string(),
        judgments:    z.array(JudgmentSchema),
        startedAt:    z.string(),
        completedAt:  z.string().nullable(),
        firstBad:     z.number().int().positive().nullable(),
    })
    .refine((state): boolean => state.low < state.high, { message: 'low must be below high' })
    .refine(
        (state): boolean => state.status !== 'active' || (state.current !== null && state.low < state.current && state.current < state.high),
        { message: 'an active session needs current strictly between low and high' },
    );
