/**
 * Method registry -- assembles an ordered registration list into an
 * immutable, collision-free MethodTable.
 *
 * A duplicate selector is a build defect: it is reported with every name
 * that shares the selector and is never resolved automatically, because
 * picking a different number for one of them would break "same name, same
 * selector" across implementations.
 */

import { z } from 'zod';
import { config } from '../config/index.js';
import { logger } from '../infra/logger.js';
import {
    DuplicateSelectorError,
    IllegalMethodNameError,
    MalformedRegistrationError,
    RegistryFrozenError,
    ReservedNumberMisuseError,
} from './errors.js';
import { CANDIDATE_BYTES, defaultHasher, digest, type Hasher } from './hasher.js';
import { isConventionalMethodName } from './naming.js';
import { formatMethodNumber, isPermittedExplicit, methodNumber, toMethodNumber } from './reservation.js';
import { MethodTable } from './table.js';
import type { MethodEntry, MethodHandler, MethodNumber, MethodRegistration } from './types.js';

export interface BuildOptions {
    /** Hash function for named registrations. Tests swap in a stub. */
    hasher?: Hasher;
    /** Reject names that are not PascalCase identifiers instead of warning. */
    strictNames?: boolean;
}

const handlerSchema = z.custom<MethodHandler>(
    value => typeof value === 'function',
    'handler must be a function',
);

const explicitSchema = z.object({
    selector: z.union([z.number(), z.bigint()]),
    name: z.string().optional(),
    handler: handlerSchema,
});

const namedSchema = z.object({
    name: z.string(),
    handler: handlerSchema,
});

const registrationSchema = z.union([explicitSchema, namedSchema]);

type ParsedRegistration = z.infer<typeof registrationSchema>;

/**
 * Translate zod issues into one line per problem.
 */
function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map(String).join('.') || 'registration';
        return `"${path}": ${issue.message}`;
    });
}

function parseRegistration(raw: unknown, index: number): ParsedRegistration {
    const parsed = registrationSchema.safeParse(raw);
    if (!parsed.success) {
        throw new MalformedRegistrationError(index, formatIssues(parsed.error));
    }
    return parsed.data;
}

function resolveEntry(registration: ParsedRegistration, index: number, options: Required<BuildOptions>): MethodEntry {
    if ('selector' in registration) {
        const selector = toMethodNumber(registration.selector);
        if (selector === undefined) {
            throw new MalformedRegistrationError(index, [
                `"selector": ${registration.selector} is not a 64-bit unsigned integer`,
            ]);
        }
        if (!isPermittedExplicit(selector)) {
            throw new ReservedNumberMisuseError(selector);
        }
        return {
            selector,
            handler: registration.handler,
            label: registration.name ?? `#${selector}`,
        };
    }

    const { name } = registration;
    if (name.length > 0 && !isConventionalMethodName(name)) {
        if (options.strictNames) {
            throw new IllegalMethodNameError(name);
        }
        logger.warn(`Method name "${name}" is not a PascalCase identifier`, 'Registry');
    }

    return {
        selector: methodNumber(name, options.hasher),
        handler: registration.handler,
        label: name,
    };
}

/**
 * Selector and label a registration would resolve to, or undefined if it
 * cannot be resolved. Used only to list every claimant of a colliding
 * selector, so it never throws.
 */
function peekClaim(raw: unknown, hasher: Hasher): { selector: MethodNumber; label: string } | undefined {
    const parsed = registrationSchema.safeParse(raw);
    if (!parsed.success) return undefined;

    const registration = parsed.data;
    if ('selector' in registration) {
        const selector = toMethodNumber(registration.selector);
        if (selector === undefined) return undefined;
        return { selector, label: registration.name ?? `#${selector}` };
    }

    const { name } = registration;
    if (name.length === 0 || digest(name, hasher).length < CANDIDATE_BYTES) return undefined;
    return { selector: methodNumber(name, hasher), label: name };
}

/**
 * Build a method table from an ordered list of registrations.
 *
 * @throws BuildError (one of its subclasses) on the first problem found
 *
 * @example
 * ```ts
 * const table = buildMethodTable([
 *   { selector: METHOD_CONSTRUCTOR, handler: construct },
 *   { name: 'Transfer', handler: transfer },
 * ]);
 * ```
 */
export function buildMethodTable(
    registrations: readonly MethodRegistration[],
    options: BuildOptions = {},
): MethodTable {
    const resolvedOptions: Required<BuildOptions> = {
        hasher: options.hasher ?? defaultHasher,
        strictNames: options.strictNames ?? config.registry.strictNames,
    };

    const claimed = new Map<MethodNumber, MethodEntry>();
    for (let index = 0; index < registrations.length; index++) {
        const entry = resolveEntry(parseRegistration(registrations[index], index), index, resolvedOptions);
        logger.debug(`Resolved: ${entry.label} -> ${formatMethodNumber(entry.selector)}`, 'Registry');

        const earlier = claimed.get(entry.selector);
        if (earlier) {
            const later = registrations.slice(index + 1).flatMap((raw) => {
                const claim = peekClaim(raw, resolvedOptions.hasher);
                return claim?.selector === entry.selector ? [claim.label] : [];
            });
            throw new DuplicateSelectorError([earlier.label, entry.label, ...later], entry.selector);
        }
        claimed.set(entry.selector, entry);
    }

    return new MethodTable([...claimed.values()]);
}

/**
 * Incremental builder for a method table.
 *
 * Registrations are collected while the registry is open; build() checks
 * them all, hands back the table and closes the registry for good.
 */
export class MethodRegistry {
    private readonly registrations: MethodRegistration[] = [];
    private built = false;

    constructor(private readonly options: BuildOptions = {}) { }

    add(registration: MethodRegistration): this {
        this.assertOpen();
        this.registrations.push(registration);
        return this;
    }

    addAll(registrations: Iterable<MethodRegistration>): this {
        for (const registration of registrations) {
            this.add(registration);
        }
        return this;
    }

    get isBuilt(): boolean {
        return this.built;
    }

    build(): MethodTable {
        this.assertOpen();
        this.built = true;
        const table = buildMethodTable(this.registrations, this.options);
        logger.info(`Built method table with ${table.size} method(s)`, 'Registry');
        return table;
    }

    private assertOpen(): void {
        if (this.built) {
            throw new RegistryFrozenError();
        }
    }
}
