/**
 * Tests for the method registry -- resolution, reserved-range checks,
 * collision detection and the build-once lifecycle.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildMethodTable, MethodRegistry } from './registry.js';
import {
    DuplicateSelectorError,
    EmptyMethodNameError,
    IllegalMethodNameError,
    MalformedRegistrationError,
    RegistryFrozenError,
    ReservedNumberMisuseError,
} from './errors.js';
import { FIRST_AVAILABLE, methodNumber } from './reservation.js';
import { constantHasher, identityHasher } from './test-hashers.js';
import type { MethodHandler, MethodRegistration } from './types.js';
import { logger } from '../infra/logger.js';

const ok: MethodHandler = () => ({ success: true, data: new Uint8Array(0) });

function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error('expected function to throw');
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('buildMethodTable', () => {
    describe('hashed registrations', () => {
        it('stores each handler under its hashed selector', () => {
            const transfer: MethodHandler = () => ({ success: true, data: new Uint8Array([1]) });
            const table = buildMethodTable([{ name: 'Transfer', handler: transfer }]);

            expect(table.size).toBe(1);
            expect(table.get(methodNumber('Transfer'))?.handler).toBe(transfer);
            expect(table.get(methodNumber('Transfer'))?.label).toBe('Transfer');
        });

        it('uses the supplied hasher', () => {
            const table = buildMethodTable([{ name: 'NaMe', handler: ok }], { hasher: identityHasher });
            expect(table.selectors()).toEqual([1314999653n]);
        });

        it('fails on an empty name', () => {
            expect(() => buildMethodTable([{ name: '', handler: ok }])).toThrow(EmptyMethodNameError);
        });

        it('places every hashed selector at or above FIRST_AVAILABLE', () => {
            const registrations = Array.from({ length: 200 }, (_, i) => ({ name: `Generated${i}`, handler: ok }));
            const table = buildMethodTable(registrations);

            expect(table.size).toBe(200);
            for (const selector of table.selectors()) {
                expect(selector).toBeGreaterThanOrEqual(FIRST_AVAILABLE);
            }
        });
    });

    describe('explicit registrations', () => {
        it('accepts the send and constructor selectors', () => {
            const table = buildMethodTable([
                { selector: 0, handler: ok },
                { selector: 1n, name: 'Constructor', handler: ok },
            ]);

            expect(table.selectors()).toEqual([0n, 1n]);
            expect(table.get(0n)?.label).toBe('#0');
            expect(table.get(1n)?.label).toBe('Constructor');
        });

        it('accepts explicit selectors in the hash-derived space', () => {
            const table = buildMethodTable([{ selector: FIRST_AVAILABLE + 7n, handler: ok }]);
            expect(table.has(16777223n)).toBe(true);
        });

        it('rejects other reserved selectors', () => {
            const err = catchError(() => buildMethodTable([{ selector: 5, handler: ok }]));

            expect(err).toBeInstanceOf(ReservedNumberMisuseError);
            expect(err).toMatchObject({ attempted: 5n });
        });

        it('never hashes the label of an explicit registration', () => {
            const digest = vi.fn((bytes: Uint8Array) => bytes);
            buildMethodTable([{ selector: 1, name: 'Constructor', handler: ok }], { hasher: { digest } });

            expect(digest).not.toHaveBeenCalled();
        });
    });

    describe('collisions', () => {
        it('fails when two names hash to the same selector and names both', () => {
            const hasher = constantHasher([0, 0, 0, 5]);
            const err = catchError(() => buildMethodTable([
                { name: 'Alpha', handler: ok },
                { name: 'Beta', handler: ok },
            ], { hasher }));

            expect(err).toBeInstanceOf(DuplicateSelectorError);
            expect(err).toMatchObject({ names: ['Alpha', 'Beta'], selector: 16777221n });
        });

        it('reports every name sharing the first colliding selector', () => {
            const hasher = constantHasher([0, 0, 0, 5]);
            const err = catchError(() => buildMethodTable([
                { selector: 1, name: 'Constructor', handler: ok },
                { name: 'Alpha', handler: ok },
                { name: 'Beta', handler: ok },
                { name: 'Gamma', handler: ok },
            ], { hasher }));

            expect(err).toMatchObject({ names: ['Alpha', 'Beta', 'Gamma'], selector: 16777221n });
        });

        it('catches a hashed name colliding with an explicit selector', () => {
            const err = catchError(() => buildMethodTable([
                { selector: 1314999653n, name: 'Pinned', handler: ok },
                { name: 'NaMe', handler: ok },
            ], { hasher: identityHasher }));

            expect(err).toMatchObject({ names: ['Pinned', 'NaMe'], selector: 1314999653n });
        });

        it('catches the same explicit selector registered twice', () => {
            const err = catchError(() => buildMethodTable([
                { selector: 1, handler: ok },
                { selector: 1n, handler: ok },
            ]));

            expect(err).toMatchObject({ names: ['#1', '#1'], selector: 1n });
        });

        it('reports the selector whose second claimant appears first', () => {
            const table = [
                { name: 'AAAA', handler: ok },
                { name: 'BBBB', handler: ok },
                { name: 'BBBB', handler: ok },
                { name: 'AAAA', handler: ok },
            ];
            const err = catchError(() => buildMethodTable(table, { hasher: identityHasher }));

            expect(err).toMatchObject({ names: ['BBBB', 'BBBB'], selector: 0x42424242n });
        });

        it('stops at the first collision before looking at later registrations', () => {
            const hasher = constantHasher([0, 0, 0, 5]);
            const err = catchError(() => buildMethodTable([
                { name: 'Alpha', handler: ok },
                { name: 'Beta', handler: ok },
                { selector: 5, handler: ok },
            ], { hasher }));

            expect(err).toBeInstanceOf(DuplicateSelectorError);
            expect(err).toMatchObject({ names: ['Alpha', 'Beta'], selector: 16777221n });
        });

        it('still lists later claimants of the colliding selector past a bad entry', () => {
            const hasher = constantHasher([0, 0, 0, 5]);
            const err = catchError(() => buildMethodTable([
                { name: 'Alpha', handler: ok },
                { name: 'Beta', handler: ok },
                { name: '', handler: ok },
                { selector: 5, handler: ok },
                { name: 'Gamma', handler: ok },
            ], { hasher }));

            expect(err).toBeInstanceOf(DuplicateSelectorError);
            expect(err).toMatchObject({ names: ['Alpha', 'Beta', 'Gamma'], selector: 16777221n });
        });

        it('reports a problem that comes before any collision', () => {
            const hasher = constantHasher([0, 0, 0, 5]);
            expect(() => buildMethodTable([
                { name: 'Alpha', handler: ok },
                { selector: 5, handler: ok },
                { name: 'Beta', handler: ok },
            ], { hasher })).toThrow(ReservedNumberMisuseError);
        });

        it('names the colliding methods in the error message', () => {
            expect(() => buildMethodTable([
                { name: 'Alpha', handler: ok },
                { name: 'Beta', handler: ok },
            ], { hasher: constantHasher([1, 0, 0, 0]) })).toThrow(
                'Selector 16777216 is claimed by more than one method: Alpha, Beta',
            );
        });
    });

    describe('registration shape', () => {
        it('rejects a registration without a callable handler', () => {
            const bad = { name: 'Transfer', handler: 'nope' } as unknown as MethodRegistration;
            const err = catchError(() => buildMethodTable([{ name: 'Mint', handler: ok }, bad]));

            expect(err).toBeInstanceOf(MalformedRegistrationError);
            expect(err).toMatchObject({ index: 1 });
        });

        it('rejects a registration with neither name nor selector', () => {
            const bad = { handler: ok } as unknown as MethodRegistration;
            expect(() => buildMethodTable([bad])).toThrow(MalformedRegistrationError);
        });

        it('rejects explicit selectors that are not u64 values', () => {
            expect(() => buildMethodTable([{ selector: -1, handler: ok }])).toThrow(MalformedRegistrationError);
            expect(() => buildMethodTable([{ selector: 2n ** 64n, handler: ok }])).toThrow(MalformedRegistrationError);
        });
    });

    describe('name conventions', () => {
        it('warns and still hashes unconventional names by default', () => {
            const warn = vi.spyOn(logger, 'warn').mockImplementation(() => { });
            const table = buildMethodTable([{ name: 'transfer', handler: ok }], { strictNames: false });

            expect(table.has(methodNumber('transfer'))).toBe(true);
            expect(warn).toHaveBeenCalledWith('Method name "transfer" is not a PascalCase identifier', 'Registry');
        });

        it('fails under strictNames', () => {
            const err = catchError(() => buildMethodTable([{ name: 'transfer', handler: ok }], { strictNames: true }));

            expect(err).toBeInstanceOf(IllegalMethodNameError);
            expect(err).toMatchObject({ methodName: 'transfer' });
        });
    });

    it('is independent of registration order apart from error reporting', () => {
        const names = ['Transfer', 'Mint', 'Burn'];
        const forward = buildMethodTable(names.map(name => ({ name, handler: ok })));
        const reverse = buildMethodTable([...names].reverse().map(name => ({ name, handler: ok })));

        expect(forward.selectors()).toEqual(reverse.selectors());
    });
});

describe('MethodRegistry', () => {
    it('collects registrations and builds once', () => {
        const registry = new MethodRegistry()
            .add({ selector: 1, handler: ok })
            .addAll([{ name: 'Mint', handler: ok }, { name: 'Burn', handler: ok }]);

        expect(registry.isBuilt).toBe(false);
        const table = registry.build();

        expect(table.size).toBe(3);
        expect(registry.isBuilt).toBe(true);
    });

    it('refuses new registrations after build', () => {
        const registry = new MethodRegistry();
        registry.build();

        expect(() => registry.add({ name: 'Late', handler: ok })).toThrow(RegistryFrozenError);
        expect(() => registry.build()).toThrow(RegistryFrozenError);
    });

    it('stays closed after a failed build', () => {
        const registry = new MethodRegistry().add({ selector: 5, handler: ok });

        expect(() => registry.build()).toThrow(ReservedNumberMisuseError);
        expect(() => registry.build()).toThrow(RegistryFrozenError);
    });

    it('passes its options to the build', () => {
        const table = new MethodRegistry({ hasher: identityHasher })
            .add({ name: 'NAME', handler: ok })
            .build();

        expect(table.selectors()).toEqual([1312902469n]);
    });
});
