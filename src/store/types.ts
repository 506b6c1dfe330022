/**
 * @file Store Type Definitions
 *
 * Storage-agnostic interfaces for the persistence layer. The content store
 * and history graph never touch I/O directly; every read and write goes
 * through a StorageBackend, so the same code runs in memory, on the local
 * filesystem, or against any key-value engine that can honour the
 * durability contract.
 *
 * @module store
 */

// ─── Storage Backend Interface ──────────────────────────────────

/**
 * Backend-agnostic key-value storage keyed by `/`-separated paths.
 *
 * Contract: when `object_write` resolves, the data is durable and a later
 * `object_read` of the same path returns it whole. A failed write leaves the
 * previous value (or absence) in place.
 */
export interface StorageBackend {
    /** Write data to a path, replacing any previous value. */
    object_write(path: string, data: string): Promise<void>;

    /** Read data from a path. Returns null if the path doesn't exist. */
    object_read(path: string): Promise<string | null>;

    /** Remove the object at a path. No-op if absent. */
    object_remove(path: string): Promise<void>;

    /** Check whether an object or directory exists at a path. */
    path_exists(path: string): Promise<boolean>;

    /** List immediate children of a path. Returns names, not full paths. */
    children_list(path: string): Promise<string[]>;
}

// ─── Hasher Interface ───────────────────────────────────────────

/**
 * Computes content fingerprints. The default is SHA-256; tests substitute
 * a weak hasher to exercise collision handling.
 */
export interface FingerprintHasher {
    /**
     * Compute the fingerprint of a blob.
     *
     * @param content - Blob text, hashed as UTF-8 bytes
     * @returns Lowercase alphanumeric fingerprint
     */
    fingerprint_compute(content: string): string;
}

/**
 * Answers whether a fingerprint is still referenced by any version.
 * Registered on the ContentStore by the history graph.
 */
export type ReferenceChecker = (fingerprint: string) => Promise<boolean>;
