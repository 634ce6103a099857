/**
 * Dispatcher -- routes an incoming (selector, parameters) call to the
 * handler bound in a MethodTable.
 *
 * Routing is a keyed lookup over a table the caller owns. The dispatcher
 * keeps no state between calls and never inspects parameter bytes or
 * handler output. A handler that throws is not caught here.
 */

import { logger } from '../infra/logger.js';
import { formatMethodNumber, toMethodNumber } from './reservation.js';
import type { MethodTable } from './table.js';
import type { DispatchRequest, DispatchResult } from './types.js';

/**
 * Invoke the handler registered for `selector`. The selector is taken as
 * the host decoded it and validated here.
 *
 * @returns the handler's data on success, `handler_failed` carrying the
 * handler's own payload, `method_not_found` when nothing is registered, or
 * `invalid_selector` when the value is not a u64
 */
export function dispatch(table: MethodTable, selector: unknown, parameters: Uint8Array): DispatchResult {
    const methodNumber = toMethodNumber(selector);
    if (methodNumber === undefined) {
        return { success: false, error: { kind: 'invalid_selector', raw: selector } };
    }

    const entry = table.get(methodNumber);
    if (!entry) {
        logger.debug(`No method for selector ${formatMethodNumber(methodNumber)}`, 'Dispatcher');
        return { success: false, error: { kind: 'method_not_found', selector: methodNumber } };
    }

    const outcome = entry.handler(parameters);
    if (outcome.success) {
        return outcome;
    }
    return { success: false, error: { kind: 'handler_failed', payload: outcome.payload } };
}

/**
 * A dispatcher bound to one table, for hosts that hand out a single
 * entry point per actor.
 */
export class Dispatcher {
    constructor(readonly table: MethodTable) { }

    dispatch(request: DispatchRequest): DispatchResult {
        return dispatch(this.table, request.selector, request.parameters);
    }

    call(selector: unknown, parameters: Uint8Array = new Uint8Array(0)): DispatchResult {
        return dispatch(this.table, selector, parameters);
    }

    toString(): string {
        return `Dispatcher(methods=${this.table.size})`;
    }
}
