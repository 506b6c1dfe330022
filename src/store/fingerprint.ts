/**
 * @file Fingerprint Hasher
 *
 * SHA-256 content fingerprints over the UTF-8 bytes of a blob.
 *
 * @module store/fingerprint
 */

import { createHash } from 'crypto';
import type { FingerprintHasher } from './types.js';

/**
 * Compute the SHA-256 fingerprint of blob content.
 *
 * @returns 64-character lowercase hex digest
 */
export function fingerprint_compute(content: string): string {
    return createHash('sha256').update(content, 'utf8').digest('hex');
}

export class Sha256Hasher implements FingerprintHasher {
    fingerprint_compute(content: string): string {
        return fingerprint_compute(content);
    }
}

/** Fingerprints double as storage keys, so they must be path-safe. */
export function fingerprint_isWellFormed(fingerprint: string): boolean {
    return /^[a-z0-9]{3,128}$/.test(fingerprint);
}

/** Storage path for a blob: two-character fan-out directory, then the rest. */
export function blobPath_resolve(fingerprint: string): string {
    return `blobs/${fingerprint.slice(0, 2)}/${fingerprint.slice(2)}`;
}
