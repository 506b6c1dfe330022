/**
 * @file ContentStore Property Tests
 *
 * Invariants under test:
 *   1. get(put(b)) returns b for any text.
 *   2. put(b) twice returns the same fingerprint.
 *   3. The number of stored blobs equals the number of distinct inputs.
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import { ContentStore } from './ContentStore.js';
import { MemoryBackend } from './backend/memory.js';

describe('ContentStore — property invariants', (): void => {
    it('get(put(b)) returns b', async (): Promise<void> => {
        await fc.assert(fc.asyncProperty(fc.fullUnicodeString(), async (text: string): Promise<boolean> => {
            const store: ContentStore = new ContentStore(new MemoryBackend());
            return (await store.get(await store.put(text))) === text;
        }));
    });

    it('put is idempotent', async (): Promise<void> => {
        await fc.assert(fc.asyncProperty(fc.string(), async (text: string): Promise<boolean> => {
            const store: ContentStore = new ContentStore(new MemoryBackend());
            return (await store.put(text)) === (await store.put(text));
        }));
    });

    it('stores one blob per distinct input', async (): Promise<void> => {
        await fc.assert(fc.asyncProperty(fc.array(fc.string({ maxLength: 4 }), { maxLength: 20 }), async (texts: string[]): Promise<boolean> => {
            const backend: MemoryBackend = new MemoryBackend();
            const store: ContentStore = new ContentStore(backend);
            await Promise.all(texts.map((text: string): Promise<string> => store.put(text)));
            return backend.size() === new Set(texts).size;
        }));
    });
});
