/**
 * Stub hashers for engineering specific selectors in tests.
 */

import type { Hasher } from './hasher.js';

/** Returns the input bytes unchanged, so "NaMe" hashes to 0x4e614d65. */
export const identityHasher: Hasher = {
    digest: bytes => bytes,
};

/** Returns the same digest for every input. */
export function constantHasher(digest: number[]): Hasher {
    return { digest: () => new Uint8Array(digest) };
}
