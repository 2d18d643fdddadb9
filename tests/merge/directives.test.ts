import { describe, expect, test } from 'vitest';
import { isDirective, remove, RemoveDirective, replace, ReplaceDirective } from '../../src/merge/directives';

describe('directives', () => {
    test('should wrap the replacement value', () => {
        const directive = replace({ host: 'db' });

        expect(directive).toBeInstanceOf(ReplaceDirective);
        expect(directive.value).toEqual({ host: 'db' });
    });

    test('should freeze replace directives', () => {
        expect(Object.isFrozen(replace('x'))).toBe(true);
    });

    test('should share a single remove directive', () => {
        expect(remove()).toBe(remove());
        expect(remove()).toBe(RemoveDirective.get());
    });

    test('should recognise directives', () => {
        expect(isDirective(replace(null))).toBe(true);
        expect(isDirective(remove())).toBe(true);
    });

    test('should tag each directive with its kind', () => {
        expect(replace(1).kind).toBe('replace');
        expect(remove().kind).toBe('remove');
    });

    test('should not mistake look-alike objects for directives', () => {
        expect(isDirective({ value: 'x' })).toBe(false);
        expect(isDirective({ kind: 'remove' })).toBe(false);
        expect(isDirective(null)).toBe(false);
        expect(isDirective('remove')).toBe(false);
    });
});
