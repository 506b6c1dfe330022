/**
 * @file Content Store
 *
 * Immutable text blobs keyed by content fingerprint. Identical content is
 * stored once. A fingerprint match is only accepted after a byte compare
 * with the stored blob; a mismatch is a collision and aborts the write.
 * Reads never rehash.
 *
 * @module store/ContentStore
 */

import {
    BlobNotFoundError,
    IntegrityViolationError,
    InvalidInputError,
    ReferencedContentError,
} from '../core/errors.js';
import type { HistoryBus } from '../core/events.js';
import { KeyedLock } from '../core/lock.js';
import { Sha256Hasher, blobPath_resolve, fingerprint_isWellFormed } from './fingerprint.js';
import type { FingerprintHasher, ReferenceChecker, StorageBackend } from './types.js';

export interface ContentStoreOptions {
    hasher?: FingerprintHasher;
    bus?: HistoryBus;
}

export class ContentStore {
    private readonly hasher: FingerprintHasher;
    private readonly bus: HistoryBus | null;
    private readonly locks: KeyedLock = new KeyedLock();
    private referenceChecker: ReferenceChecker | null = null;

    constructor(
        private readonly backend: StorageBackend,
        options: ContentStoreOptions = {},
    ) {
        this.hasher = options.hasher ?? new Sha256Hasher();
        this.bus = options.bus ?? null;
    }

    /**
     * Register the oracle consulted by `remove`. The history graph installs
     * one that knows every committed and in-flight fingerprint.
     */
    referenceChecker_set(checker: ReferenceChecker): void {
        this.referenceChecker = checker;
    }

    /**
     * Fingerprint `content` without storing it.
     *
     * @throws {IntegrityViolationError} If the hasher produces a malformed fingerprint
     */
    fingerprint_compute(content: string): string {
        const fingerprint: string = this.hasher.fingerprint_compute(content);
        if (!fingerprint_isWellFormed(fingerprint)) {
            throw new IntegrityViolationError(`Hasher produced a malformed fingerprint '${fingerprint}'`);
        }
        return fingerprint;
    }

    /**
     * Store content, returning its fingerprint. Idempotent: storing the same
     * content again returns the same fingerprint without a second write.
     *
     * @throws {IntegrityViolationError} If the fingerprint is already taken by different content
     */
    async put(content: string): Promise<string> {
        const fingerprint: string = this.fingerprint_compute(content);
        const blobPath: string = blobPath_resolve(fingerprint);

        return this.locks.run(fingerprint, async (): Promise<string> => {
            const existing: string | null = await this.backend.object_read(blobPath);
            if (existing !== null) {
                if (existing !== content) {
                    throw new IntegrityViolationError(
                        `Fingerprint collision on ${fingerprint}: stored blob differs from new content`,
                    );
                }
                return fingerprint;
            }

            await this.backend.object_write(blobPath, content);
            this.bus?.emit({ type: 'blob_write', fingerprint, size: Buffer.byteLength(content, 'utf8') });
            return fingerprint;
        });
    }

    /**
     * Fetch blob content by fingerprint.
     *
     * @throws {BlobNotFoundError} If no blob has this fingerprint
     */
    async get(fingerprint: string): Promise<string> {
        const content: string | null = fingerprint_isWellFormed(fingerprint)
            ? await this.backend.object_read(blobPath_resolve(fingerprint))
            : null;
        if (content === null) {
            throw new BlobNotFoundError(fingerprint);
        }
        return content;
    }

    async has(fingerprint: string): Promise<boolean> {
        if (!fingerprint_isWellFormed(fingerprint)) return false;
        return this.backend.path_exists(blobPath_resolve(fingerprint));
    }

    /**
     * Delete an unreferenced blob.
     *
     * @throws {BlobNotFoundError} If the blob doesn't exist
     * @throws {ReferencedContentError} While any version points at it
     */
    async remove(fingerprint: string): Promise<void> {
        if (!fingerprint_isWellFormed(fingerprint)) {
            throw new InvalidInputError(`Malformed fingerprint '${fingerprint}'`);
        }
        await this.locks.run(fingerprint, async (): Promise<void> => {
            const blobPath: string = blobPath_resolve(fingerprint);
            if (!(await this.backend.path_exists(blobPath))) {
                throw new BlobNotFoundError(fingerprint);
            }
            if (this.referenceChecker && (await this.referenceChecker(fingerprint))) {
                throw new ReferencedContentError(fingerprint);
            }
            await this.backend.object_remove(blobPath);
        });
    }

    /** All stored fingerprints, sorted. */
    async fingerprints_list(): Promise<string[]> {
        const fingerprints: string[] = [];
        for (const fanout of await this.backend.children_list('blobs')) {
            for (const rest of await this.backend.children_list(`blobs/${fanout}`)) {
                fingerprints.push(`${fanout}${rest}`);
            }
        }
        return fingerprints.sort();
    }
}
