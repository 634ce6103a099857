/**
 * Build-time error types for the method registry.
 *
 * Every one of these is fatal to an actor definition: the table is never
 * produced once a BuildError has been thrown.
 */

import type { MethodNumber } from './types.js';

/**
 * Base error class for table build errors.
 */
export class BuildError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'BuildError';
    }
}

/**
 * Error thrown when a method name is empty.
 */
export class EmptyMethodNameError extends BuildError {
    constructor() {
        super('Method name must not be empty');
        this.name = 'EmptyMethodNameError';
    }
}

/**
 * Error thrown under strict naming when a name is not a PascalCase identifier.
 */
export class IllegalMethodNameError extends BuildError {
    readonly methodName: string;

    constructor(methodName: string) {
        super(`Illegal method name '${methodName}': must start with an uppercase letter or '_' and contain only letters, digits and '_'`);
        this.name = 'IllegalMethodNameError';
        this.methodName = methodName;
    }
}

/**
 * Error thrown when a hasher yields a digest too short to read a selector from.
 */
export class IndeterminableSelectorError extends BuildError {
    readonly methodName: string;
    readonly digestLength: number;

    constructor(methodName: string, digestLength: number) {
        super(`Cannot derive a selector for '${methodName}': digest has ${digestLength} bytes`);
        this.name = 'IndeterminableSelectorError';
        this.methodName = methodName;
        this.digestLength = digestLength;
    }
}

/**
 * Error thrown when an explicit selector falls in the reserved range
 * without being one of the permitted standard numbers.
 */
export class ReservedNumberMisuseError extends BuildError {
    readonly attempted: MethodNumber;

    constructor(attempted: MethodNumber) {
        super(`Selector ${attempted} is reserved for standardized methods and cannot be registered explicitly`);
        this.name = 'ReservedNumberMisuseError';
        this.attempted = attempted;
    }
}

/**
 * Error thrown when two or more registrations resolve to the same selector.
 * Renaming one of the methods is the only fix.
 */
export class DuplicateSelectorError extends BuildError {
    readonly names: string[];
    readonly selector: MethodNumber;

    constructor(names: string[], selector: MethodNumber) {
        super(`Selector ${selector} is claimed by more than one method: ${names.join(', ')}`);
        this.name = 'DuplicateSelectorError';
        this.names = names;
        this.selector = selector;
    }
}

/**
 * Error thrown when a registration does not have the expected shape.
 */
export class MalformedRegistrationError extends BuildError {
    readonly index: number;
    readonly issues: string[];

    constructor(index: number, issues: string[]) {
        super(`Malformed registration at index ${index}: ${issues.join('; ')}`);
        this.name = 'MalformedRegistrationError';
        this.index = index;
        this.issues = issues;
    }
}

/**
 * Error thrown when a registry is used after its table has been built.
 */
export class RegistryFrozenError extends BuildError {
    constructor() {
        super('Method registry has already been built');
        this.name = 'RegistryFrozenError';
    }
}

/**
 * Error thrown by the messenger when the host fails to deliver a call.
 */
export class MessengerSendError extends Error {
    readonly methodName: string;
    readonly selector: MethodNumber;

    constructor(methodName: string, selector: MethodNumber, cause: unknown) {
        super(`Failed to send '${methodName}' (selector ${selector})`, { cause });
        this.name = 'MessengerSendError';
        this.methodName = methodName;
        this.selector = selector;
    }
}
