import type { ConfigValue } from '../types';

/**
 * Marks a value in an incoming fragment that must overwrite whatever the base
 * holds at the same key, without being merged into it.
 *
 * @example
 * ```typescript
 * merge({ db: { host: 'a', port: 1 } }, { db: replace({ host: 'b' }) });
 * // { db: { host: 'b' } }
 * ```
 */
export class ReplaceDirective<T extends ConfigValue = ConfigValue> {
    public readonly kind = 'replace';

    constructor(public readonly value: T) {
        Object.freeze(this);
    }
}

/**
 * Marks a key in an incoming fragment that must be deleted from the base.
 * Removing a key the base does not hold does nothing.
 */
export class RemoveDirective {
    private static readonly instance = new RemoveDirective();

    public readonly kind = 'remove';

    private constructor() {
        Object.freeze(this);
    }

    static get(): RemoveDirective {
        return RemoveDirective.instance;
    }
}

export type Directive = ReplaceDirective | RemoveDirective;

export const replace = <T extends ConfigValue>(value: T): ReplaceDirective<T> => new ReplaceDirective(value);

export const remove = (): RemoveDirective => RemoveDirective.get();

export const isDirective = (value: unknown): value is Directive =>
    value instanceof ReplaceDirective || value instanceof RemoveDirective;
