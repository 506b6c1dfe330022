/**
 * @file Memory Storage Backend
 *
 * StorageBackend over an in-process Map. Directories are implicit: a path
 * exists if an object lives at it or beneath it.
 *
 * @module store/backend
 */

import type { StorageBackend } from '../types.js';
import { path_normalize } from './paths.js';

export class MemoryBackend implements StorageBackend {
    private readonly objects: Map<string, string> = new Map();

    async object_write(path: string, data: string): Promise<void> {
        this.objects.set(path_normalize(path), data);
    }

    async object_read(path: string): Promise<string | null> {
        return this.objects.get(path_normalize(path)) ?? null;
    }

    async object_remove(path: string): Promise<void> {
        this.objects.delete(path_normalize(path));
    }

    async path_exists(path: string): Promise<boolean> {
        const key: string = path_normalize(path);
        if (this.objects.has(key)) return true;
        const prefix: string = `${key}/`;
        for (const existing of this.objects.keys()) {
            if (existing.startsWith(prefix)) return true;
        }
        return false;
    }

    async children_list(path: string): Promise<string[]> {
        const key: string = path_normalize(path);
        const prefix: string = key === '' ? '' : `${key}/`;
        const children: Set<string> = new Set();
        for (const existing of this.objects.keys()) {
            if (!existing.startsWith(prefix)) continue;
            const rest: string = existing.slice(prefix.length);
            const name: string = rest.split('/')[0];
            if (name) children.add(name);
        }
        return [...children].sort();
    }

    /** Number of stored objects (all paths). */
    size(): number {
        return this.objects.size;
    }
}
