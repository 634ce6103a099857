/**
 * Selector lookup for the `hash` command.
 */

import { formatMethodNumber, methodNumber } from '../dispatch/reservation.js';
import { toMethodName } from '../dispatch/naming.js';

export interface HashOptions {
    /** Treat inputs as code identifiers and convert them to PascalCase first. */
    ident?: boolean;
    json?: boolean;
}

export interface SelectorRow {
    name: string;
    selector: bigint;
    hex: string;
}

export function resolveSelectors(inputs: readonly string[], options: HashOptions = {}): SelectorRow[] {
    return inputs.map((input) => {
        const name = options.ident ? toMethodName(input) : input;
        const selector = methodNumber(name);
        return { name, selector, hex: formatMethodNumber(selector) };
    });
}

/** One line per name (`name<TAB>decimal<TAB>hex`), or a JSON array. */
export function renderSelectors(rows: readonly SelectorRow[], options: HashOptions = {}): string {
    if (options.json) {
        return JSON.stringify(rows.map(row => ({ ...row, selector: row.selector.toString() })), null, 2);
    }
    return rows.map(row => `${row.name}\t${row.selector}\t${row.hex}`).join('\n');
}
