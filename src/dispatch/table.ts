/**
 * Immutable selector -> handler table for one actor.
 *
 * Only the registry creates tables. Once constructed a table has no way to
 * change; a different set of methods needs a new table.
 */

import { ReservedNumberMisuseError } from './errors.js';
import { isPermittedExplicit } from './reservation.js';
import type { MethodEntry, MethodNumber } from './types.js';

export class MethodTable {
    private readonly byNumber: ReadonlyMap<MethodNumber, MethodEntry>;

    /** @internal Use buildMethodTable() or MethodRegistry.build(). */
    constructor(entries: readonly MethodEntry[]) {
        const map = new Map<MethodNumber, MethodEntry>();
        for (const entry of entries) {
            if (!isPermittedExplicit(entry.selector)) {
                throw new ReservedNumberMisuseError(entry.selector);
            }
            if (map.has(entry.selector)) {
                throw new Error(`Duplicate selector ${entry.selector} reached table construction`);
            }
            map.set(entry.selector, Object.freeze({ ...entry }));
        }
        this.byNumber = map;
        Object.freeze(this);
    }

    get size(): number {
        return this.byNumber.size;
    }

    get(selector: MethodNumber): MethodEntry | undefined {
        return this.byNumber.get(selector);
    }

    has(selector: MethodNumber): boolean {
        return this.byNumber.has(selector);
    }

    /** All selectors in ascending order. */
    selectors(): MethodNumber[] {
        return this.entries().map(entry => entry.selector);
    }

    /** All entries, ordered by selector. */
    entries(): MethodEntry[] {
        return Array.from(this.byNumber.values())
            .sort((a, b) => (a.selector < b.selector ? -1 : a.selector > b.selector ? 1 : 0));
    }
}
