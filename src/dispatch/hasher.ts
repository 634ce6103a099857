/**
 * Selector hasher -- turns a method name into a candidate selector.
 *
 * The hash function and the bytes read from its digest are part of the
 * wire contract: any implementation computing a selector for the same name
 * must arrive at the same number.
 */

import { createHash } from 'node:crypto';
import { EmptyMethodNameError, IndeterminableSelectorError } from './errors.js';

/** Number of leading digest bytes read as the candidate (big-endian). */
export const CANDIDATE_BYTES = 4;

/**
 * A cryptographic hash over raw bytes. Swappable so tests can engineer
 * collisions; production code uses Blake2bHasher.
 */
export interface Hasher {
    digest(bytes: Uint8Array): Uint8Array;
}

/** BLAKE2b with a 64-byte digest. */
export class Blake2bHasher implements Hasher {
    digest(bytes: Uint8Array): Uint8Array {
        return new Uint8Array(createHash('blake2b512').update(bytes).digest());
    }
}

export const defaultHasher: Hasher = new Blake2bHasher();

const encoder = new TextEncoder();

/**
 * Hash the UTF-8 bytes of a method name.
 * @throws EmptyMethodNameError if the name is empty
 */
export function digest(name: string, hasher: Hasher = defaultHasher): Uint8Array {
    if (name.length === 0) {
        throw new EmptyMethodNameError();
    }
    return hasher.digest(encoder.encode(name));
}

/**
 * Read the candidate selector for a name: the first four digest bytes as a
 * big-endian unsigned integer.
 */
export function candidate(name: string, hasher: Hasher = defaultHasher): bigint {
    const bytes = digest(name, hasher);
    if (bytes.length < CANDIDATE_BYTES) {
        throw new IndeterminableSelectorError(name, bytes.length);
    }

    let value = 0n;
    for (let i = 0; i < CANDIDATE_BYTES; i++) {
        value = (value << 8n) | BigInt(bytes[i]);
    }
    return value;
}
