/**
 * @file Repository Settings
 *
 * Resolves repository settings with deterministic precedence
 * (override > env > settings file > defaults) and validates the merged
 * result in one place. The resolver also reports which source supplied
 * each key.
 *
 * @module config/settings
 */

import { promises as fs } from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { InvalidInputError } from '../core/errors.js';
import type { LogLevel } from '../core/log.js';
import { input_validate } from '../core/validation.js';

export type StorageKind = 'memory' | 'fs';

/**
 * @property root - Directory for the `fs` backend
 * @property significance - Minimum magnitude for a diff entry to count as significant
 */
export interface RepositorySettings {
    storage: StorageKind;
    root: string;
    logLevel: LogLevel;
    significance: number;
}

export type SettingsKey = keyof RepositorySettings;

export type SettingSource = 'override' | 'env' | 'file' | 'default';

export interface ResolvedSettings {
    settings: RepositorySettings;
    sources: Record<SettingsKey, SettingSource>;
}

export type Environment = Record<string, string | undefined>;

export const SETTINGS_DEFAULTS: Readonly<RepositorySettings> = Object.freeze({
    storage: 'memory',
    root: '.promptline',
    logLevel: 'warn',
    significance: 0.1,
});

const ENV_KEYS: Record<SettingsKey, string> = {
    storage: 'PROMPTLINE_STORAGE',
    root: 'PROMPTLINE_ROOT',
    logLevel: 'PROMPTLINE_LOG_LEVEL',
    significance: 'PROMPTLINE_SIGNIFICANCE',
};

const SETTINGS_KEYS: readonly SettingsKey[] = ['storage', 'root', 'logLevel', 'significance'];

// ─── Schemas ────────────────────────────────────────────────────

export const SettingsSchema = z
    .object({
        storage:      z.enum(['memory', 'fs']),
        root:         z.string().min(1, 'root must be a non-empty path'),
        logLevel:     z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        significance: z.number().min(0).max(1),
    })
    .strict();

/** A settings file may set any subset of keys, and nothing else. */
export const SettingsFileSchema = SettingsSchema.partial();

// ─── Resolution ─────────────────────────────────────────────────

export class SettingsService {
    constructor(
        private readonly env: Environment = process.env,
        private readonly file: Partial<RepositorySettings> = {},
    ) {}

    /**
     * Merge every source and validate the result.
     *
     * @throws {InvalidInputError} Listing every invalid key
     */
    resolve(overrides: Partial<RepositorySettings> = {}): ResolvedSettings {
        const merged: Record<string, unknown> = {};
        const sources: Record<SettingsKey, SettingSource> = {
            storage: 'default',
            root: 'default',
            logLevel: 'default',
            significance: 'default',
        };

        for (const key of SETTINGS_KEYS) {
            const envValue: unknown = this.envValue_resolve(key);
            if (overrides[key] !== undefined) {
                merged[key] = overrides[key];
                sources[key] = 'override';
            } else if (envValue !== undefined) {
                merged[key] = envValue;
                sources[key] = 'env';
            } else if (this.file[key] !== undefined) {
                merged[key] = this.file[key];
                sources[key] = 'file';
            } else {
                merged[key] = SETTINGS_DEFAULTS[key];
            }
        }

        const settings: RepositorySettings = input_validate(SettingsSchema, merged, 'settings');
        return { settings, sources };
    }

    /** Source that supplies `key` under the given overrides. */
    source_get(key: SettingsKey, overrides: Partial<RepositorySettings> = {}): SettingSource {
        if (overrides[key] !== undefined) return 'override';
        if (this.envValue_resolve(key) !== undefined) return 'env';
        if (this.file[key] !== undefined) return 'file';
        return 'default';
    }

    private envValue_resolve(key: SettingsKey): unknown {
        const raw: string | undefined = this.env[ENV_KEYS[key]];
        if (!raw) return undefined;
        return key === 'significance' ? Number(raw) : raw;
    }
}

// ─── Settings File ──────────────────────────────────────────────

/**
 * Parse a YAML settings document. An empty document sets nothing.
 *
 * @throws {InvalidInputError} On malformed YAML or unknown/invalid keys
 */
export function settings_parseYaml(text: string): Partial<RepositorySettings> {
    let document: unknown;
    try {
        document = yaml.load(text);
    } catch (error: unknown) {
        const detail: string = error instanceof Error ? error.message : String(error);
        throw new InvalidInputError(`Invalid settings file: ${detail}`);
    }
    if (document === null || document === undefined) return {};
    return input_validate(SettingsFileSchema, document, 'settings file');
}

/**
 * Resolve settings, reading `path` as the settings file when given. A
 * missing file means defaults.
 */
export async function settings_load(
    path?: string,
    overrides: Partial<RepositorySettings> = {},
    env: Environment = process.env,
): Promise<ResolvedSettings> {
    let file: Partial<RepositorySettings> = {};
    if (path) {
        const text: string | null = await file_readOptional(path);
        if (text !== null) file = settings_parseYaml(text);
    }
    return new SettingsService(env, file).resolve(overrides);
}

async function file_readOptional(path: string): Promise<string | null> {
    try {
        return await fs.readFile(path, 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
        throw error;
    }
}
