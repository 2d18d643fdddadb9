import type { ConfigMap, ConfigScalar, ConfigTree, ConfigValue, FragmentMap, FragmentTree, FragmentValue } from '../types';
import { RemoveDirective, ReplaceDirective } from './directives';

type TreeKey = string | number;

const INTEGER_KEY = /^(?:0|[1-9]\d*)$/;

/**
 * Type guard for plain objects: not null, not an array, and created by an
 * object literal (or with a null prototype). Class instances, dates and
 * directives are not plain objects.
 */
export const isPlainObject = (value: unknown): value is Record<string, unknown> => {
    if (value === null || typeof value !== 'object' || Array.isArray(value)) {
        return false;
    }
    const proto = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
};

/**
 * Type guard for fragments a provider may hand over: plain objects. Nested
 * values are not inspected; the merge treats anything that is not a tree as a
 * leaf.
 */
export const isFragmentMap = (value: unknown): value is FragmentMap => isPlainObject(value);

/**
 * Type guard for configuration trees: plain objects and arrays.
 */
export const isTree = (value: unknown): value is FragmentTree => Array.isArray(value) || isPlainObject(value);

const toKey = (key: string): TreeKey => {
    if (INTEGER_KEY.test(key)) {
        const index = Number(key);
        if (Number.isSafeInteger(index)) {
            return index;
        }
    }
    return key;
};

function entriesOf<V>(tree: Record<string, V> | V[]): Array<[TreeKey, V]> {
    const entries: Array<[TreeKey, V]> = [];
    if (Array.isArray(tree)) {
        // forEach skips holes, so a sparse list only yields the indices it holds
        tree.forEach((value, index) => entries.push([index, value]));
        return entries;
    }
    for (const key of Object.keys(tree)) {
        entries.push([toKey(key), tree[key]]);
    }
    return entries;
}

const isEmptyTree = (tree: ConfigTree): boolean =>
    Array.isArray(tree) ? tree.length === 0 : Object.keys(tree).length === 0;

/**
 * Next free list index of each tree the merge has built. Removing the highest
 * list key does not hand its index out again on a later merge.
 */
const nextFreeIndex = new WeakMap<ConfigTree, number>();

interface MergedEntries {
    entries: Map<TreeKey, ConfigValue>;
    nextIndex: number;
}

const record = <T extends ConfigTree>(tree: T, nextIndex: number): T => {
    nextFreeIndex.set(tree, nextIndex);
    return tree;
};

const toMap = ({ entries, nextIndex }: MergedEntries): ConfigMap =>
    record(Object.fromEntries(Array.from(entries, ([key, value]) => [String(key), value])), nextIndex);

/**
 * A list stays a list only while its keys run 0..n-1 in order; anything else
 * keeps its keys as a map so gaps survive.
 */
const toTree = (merged: MergedEntries, asList: boolean): ConfigTree => {
    if (asList) {
        let expected = 0;
        for (const key of merged.entries.keys()) {
            if (key !== expected) {
                return toMap(merged);
            }
            expected++;
        }
        return record(Array.from(merged.entries.values()), merged.nextIndex);
    }
    return toMap(merged);
};

/**
 * Converts a fragment value into a plain configuration value: nested trees are
 * copied, `Remove` markers inside them are dropped and `Replace` markers are
 * unwrapped. Values that are not trees are kept as they are.
 */
export function resolveFragment(value: ConfigScalar | FragmentTree): ConfigValue {
    if (!isTree(value)) {
        return value;
    }
    const asList = Array.isArray(value);
    return toTree(mergeEntries(asList ? [] : {}, value), asList);
}

function mergeEntries(base: ConfigTree, incoming: FragmentTree): MergedEntries {
    const result = new Map<TreeKey, ConfigValue>(entriesOf<ConfigValue>(base));

    let nextIndex = nextFreeIndex.get(base) ?? 0;
    const claim = (key: TreeKey) => {
        if (typeof key === 'number' && key >= nextIndex) {
            nextIndex = key + 1;
        }
    };
    for (const key of result.keys()) {
        claim(key);
    }

    for (const [key, value] of entriesOf<FragmentValue>(incoming)) {
        if (value === undefined) {
            continue;
        }

        if (value instanceof ReplaceDirective) {
            result.set(key, resolveFragment(value.value));
            claim(key);
            continue;
        }

        if (result.has(key)) {
            if (value instanceof RemoveDirective) {
                result.delete(key);
                continue;
            }

            if (typeof key === 'number') {
                // list keys never overwrite: the value goes to the next free index
                result.set(nextIndex, resolveFragment(value));
                claim(nextIndex);
                continue;
            }

            const current = result.get(key);
            if (isTree(current) && isTree(value)) {
                result.set(key, mergeTree(current, value));
            } else {
                result.set(key, resolveFragment(value));
            }
            continue;
        }

        if (value instanceof RemoveDirective) {
            continue;
        }

        result.set(key, resolveFragment(value));
        claim(key);
    }

    return { entries: result, nextIndex };
}

/**
 * Merges two trees of any kind. A list base stays a list unless the merge
 * leaves a gap in its indices; an empty base takes the kind of `incoming`.
 */
export function mergeTree(base: ConfigTree, incoming: FragmentTree): ConfigTree {
    const asList = Array.isArray(base) || (isEmptyTree(base) && Array.isArray(incoming));
    return toTree(mergeEntries(base, incoming), asList);
}

/**
 * Deep merges `incoming` into `base`, returning a new tree. Neither input is
 * modified.
 *
 * For each entry of `incoming`, in order:
 * - `replace(v)` sets the key to `v` without merging it with the base value.
 * - `remove()` deletes the key from the result; on an absent key it does nothing.
 * - A list key (array index or integer-like key) that the base already holds is
 *   appended under the next free integer key instead of overwriting.
 * - Two trees under the same key are merged recursively.
 * - Anything else overwrites.
 *
 * @example
 * ```typescript
 * merge({ 0: 'a', db: { host: 'x' } }, { 0: 'b', db: { port: 5432 } });
 * // { 0: 'a', 1: 'b', db: { host: 'x', port: 5432 } }
 * ```
 */
export function merge(base: ConfigMap, incoming: FragmentMap): ConfigMap {
    return toMap(mergeEntries(base, incoming));
}
