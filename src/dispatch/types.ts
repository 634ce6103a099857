/**
 * Shared types for the method-dispatch protocol.
 */

/** A 64-bit unsigned method selector. */
export type MethodNumber = bigint;

/** What a handler reports back to the dispatcher. */
export type HandlerResult =
    | { success: true; data: Uint8Array }
    | { success: false; payload: unknown };

/**
 * The callable bound to one selector. Parameters and results are opaque
 * bytes; decoding them is the handler's business.
 */
export type MethodHandler = (parameters: Uint8Array) => HandlerResult;

/** A hashed registration, identified by method name. */
export interface NamedRegistration {
    name: string;
    handler: MethodHandler;
}

/**
 * An explicit registration for a standardized method. `name` is only a
 * label for diagnostics and is never hashed.
 */
export interface ExplicitRegistration {
    selector: number | bigint;
    name?: string;
    handler: MethodHandler;
}

export type MethodRegistration = NamedRegistration | ExplicitRegistration;

export interface MethodEntry {
    readonly selector: MethodNumber;
    readonly handler: MethodHandler;
    /** Method name, or `#<selector>` for an unnamed explicit entry. */
    readonly label: string;
}

export type DispatchError =
    | { kind: 'method_not_found'; selector: MethodNumber }
    | { kind: 'handler_failed'; payload: unknown }
    | { kind: 'invalid_selector'; raw: unknown };

export type DispatchResult =
    | { success: true; data: Uint8Array }
    | { success: false; error: DispatchError };

export interface DispatchRequest {
    selector: number | bigint;
    parameters: Uint8Array;
}
