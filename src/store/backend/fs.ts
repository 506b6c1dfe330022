/**
 * @file Filesystem Storage Backend
 *
 * StorageBackend over a directory on the local filesystem. Each write goes
 * to a temp file beside the target, is fsynced, then renamed over the
 * target, and the directories whose entries changed are fsynced too, so
 * readers see either the old object or the new one and a resolved write
 * survives a crash.
 *
 * @module store/backend
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomBytes } from 'crypto';
import type { StorageBackend } from '../types.js';
import { path_normalize } from './paths.js';

export class FsBackend implements StorageBackend {
    constructor(private readonly root: string) {}

    async object_write(objectPath: string, data: string): Promise<void> {
        const target: string = this.path_resolve(objectPath);
        const directory: string = path.dirname(target);
        const firstCreated: string | undefined = await fs.mkdir(directory, { recursive: true });

        const temp: string = `${target}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`;
        const handle = await fs.open(temp, 'w');
        try {
            try {
                await handle.writeFile(data, 'utf8');
                await handle.sync();
            } finally {
                await handle.close();
            }
            await fs.rename(temp, target);
        } catch (error: unknown) {
            await fs.rm(temp, { force: true });
            throw error;
        }

        // The rename and any new directory entries are durable only once their parents are synced.
        for (const dir of syncTargets_list(directory, firstCreated)) {
            await directory_sync(dir);
        }
    }

    async object_read(objectPath: string): Promise<string | null> {
        try {
            return await fs.readFile(this.path_resolve(objectPath), 'utf8');
        } catch (error: unknown) {
            if (errno_is(error, 'ENOENT') || errno_is(error, 'EISDIR')) return null;
            throw error;
        }
    }

    async object_remove(objectPath: string): Promise<void> {
        await fs.rm(this.path_resolve(objectPath), { force: true });
    }

    async path_exists(objectPath: string): Promise<boolean> {
        try {
            await fs.access(this.path_resolve(objectPath));
            return true;
        } catch (error: unknown) {
            if (errno_is(error, 'ENOENT')) return false;
            throw error;
        }
    }

    async children_list(objectPath: string): Promise<string[]> {
        try {
            const entries: string[] = await fs.readdir(this.path_resolve(objectPath));
            return entries.filter((name: string): boolean => !name.endsWith('.tmp')).sort();
        } catch (error: unknown) {
            if (errno_is(error, 'ENOENT') || errno_is(error, 'ENOTDIR')) return [];
            throw error;
        }
    }

    private path_resolve(objectPath: string): string {
        return path.join(this.root, ...path_normalize(objectPath).split('/'));
    }
}

/**
 * Directories whose entries changed: the target's own directory, then the
 * parent of every directory `mkdir` created, deepest first.
 */
export function syncTargets_list(directory: string, firstCreated: string | undefined): string[] {
    const dirs: string[] = [directory];
    if (firstCreated === undefined) return dirs;
    let current: string = directory;
    while (current !== firstCreated && current !== path.dirname(current)) {
        current = path.dirname(current);
        dirs.push(current);
    }
    dirs.push(path.dirname(firstCreated));
    return dirs;
}

async function directory_sync(dir: string): Promise<void> {
    const handle = await fs.open(dir, 'r');
    try {
        await handle.sync();
    } finally {
        await handle.close();
    }
}

function errno_is(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
