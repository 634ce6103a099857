/**
 * Actor definitions -- one method table per actor, built once when the
 * actor is defined and shared by every call afterwards.
 */

import { dispatch } from './dispatcher.js';
import type { Hasher } from './hasher.js';
import { MethodRegistry } from './registry.js';
import { methodNumber } from './reservation.js';
import type { MethodTable } from './table.js';
import type { DispatchResult, MethodNumber, MethodRegistration } from './types.js';

export interface ActorDefinition {
    name: string;
    /** Registration list, typically produced by code generation. */
    methods: readonly MethodRegistration[];
    strictNames?: boolean;
    hasher?: Hasher;
}

export interface Actor {
    readonly name: string;
    readonly table: MethodTable;
    /** Host entry point: route one call. */
    dispatch(selector: unknown, parameters: Uint8Array): DispatchResult;
    /** Selector this actor's hasher assigns to a method name. */
    methodNumber(methodName: string): MethodNumber;
}

/**
 * Define an actor and build its method table.
 *
 * @throws BuildError if the registrations do not form a valid table
 *
 * @example
 * ```ts
 * const token = defineActor({
 *   name: 'token',
 *   methods: [
 *     { selector: METHOD_CONSTRUCTOR, name: 'Constructor', handler: construct },
 *     { name: 'Transfer', handler: transfer },
 *   ],
 * });
 *
 * const result = token.dispatch(token.methodNumber('Transfer'), params);
 * ```
 */
export function defineActor(definition: ActorDefinition): Actor {
    const registry = new MethodRegistry({
        hasher: definition.hasher,
        strictNames: definition.strictNames,
    });
    const table = registry.addAll(definition.methods).build();
    const { hasher } = definition;

    return Object.freeze({
        name: definition.name,
        table,
        dispatch: (selector: unknown, parameters: Uint8Array) => dispatch(table, selector, parameters),
        methodNumber: (methodName: string) => methodNumber(methodName, hasher),
    });
}
