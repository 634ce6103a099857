/**
 * Reservation policy -- maps hash candidates into the selector space and
 * defines which low selectors may be registered explicitly.
 *
 * Nothing here is configurable. Changing FIRST_AVAILABLE or the normalization
 * rule changes every hashed selector and breaks interoperability with any
 * other implementation.
 */

import { candidate, defaultHasher, type Hasher } from './hasher.js';
import type { MethodNumber } from './types.js';

/** First selector of the hash-derived space (2^24). */
export const FIRST_AVAILABLE: MethodNumber = 2n ** 24n;

/** Largest value a 64-bit selector can hold. */
export const MAX_METHOD_NUMBER: MethodNumber = 2n ** 64n - 1n;

/** Plain value transfer; invokes no code. */
export const METHOD_SEND: MethodNumber = 0n;

export const METHOD_CONSTRUCTOR: MethodNumber = 1n;

export interface ReservationPolicy {
    readonly firstAvailable: MethodNumber;
    /** Selectors below firstAvailable that may be registered explicitly. */
    readonly permittedExplicit: ReadonlySet<MethodNumber>;
}

export const RESERVATION_POLICY: ReservationPolicy = Object.freeze({
    firstAvailable: FIRST_AVAILABLE,
    permittedExplicit: new Set([METHOD_SEND, METHOD_CONSTRUCTOR]),
});

/** Lift a candidate below FIRST_AVAILABLE into the hash-derived space. */
export function normalize(value: bigint): MethodNumber {
    return value >= FIRST_AVAILABLE ? value : value + FIRST_AVAILABLE;
}

export function isPermittedExplicit(selector: MethodNumber): boolean {
    return selector >= RESERVATION_POLICY.firstAvailable
        || RESERVATION_POLICY.permittedExplicit.has(selector);
}

/** Compute the selector for a method name. */
export function methodNumber(name: string, hasher: Hasher = defaultHasher): MethodNumber {
    return normalize(candidate(name, hasher));
}

/**
 * Validate a caller-supplied value as a u64 selector.
 * Returns undefined for anything but a number or bigint, and for negatives,
 * fractions, unsafe integers and values wider than 64 bits.
 */
export function toMethodNumber(value: unknown): MethodNumber | undefined {
    if (typeof value === 'number') {
        if (!Number.isSafeInteger(value) || value < 0) return undefined;
        return BigInt(value);
    }
    if (typeof value !== 'bigint') return undefined;
    if (value < 0n || value > MAX_METHOD_NUMBER) return undefined;
    return value;
}

/** Render a selector as zero-padded hex for logs and tooling. */
export function formatMethodNumber(selector: MethodNumber): string {
    return `0x${selector.toString(16).padStart(8, '0')}`;
}
