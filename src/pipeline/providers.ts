import { ProviderReturnedInvalidConfigError } from '../error/ProviderReturnedInvalidConfigError';
import { isFragmentMap, merge } from '../merge/merge';
import { describeType, resolveProvider, type Registry, type ResolvedProvider } from '../resolve';
import type { ConfigMap, Logger } from '../types';

const isIterable = (value: unknown): value is Iterable<unknown> =>
    typeof value === 'object' && value !== null && Symbol.iterator in value &&
    typeof Reflect.get(value, Symbol.iterator) === 'function';

/**
 * Checks one fragment and folds it into the accumulator.
 */
const mergeFragment = (accumulated: ConfigMap, fragment: unknown, provider: ResolvedProvider): ConfigMap => {
    if (!isFragmentMap(fragment)) {
        throw new ProviderReturnedInvalidConfigError(provider.name, describeType(fragment));
    }
    return merge(accumulated, fragment);
};

/**
 * Runs every provider once, in order, and folds what each produces into one
 * configuration map.
 *
 * A provider that returns a map contributes that map. A provider that returns
 * an iterable that is not an array (typically a generator) is drained eagerly and every
 * yielded map is merged as soon as it is produced. Resolution happens just
 * before each provider runs, so a bad descriptor fails after the providers
 * ahead of it and before any that follow.
 *
 * @param providers - Provider descriptors in precedence order (later wins)
 * @param registry - Registry used to resolve string descriptors
 * @param logger - Logger for debugging output
 * @returns The merged configuration
 * @throws {InvalidProviderError} When a descriptor cannot be resolved
 * @throws {ProviderReturnedInvalidConfigError} When a provider produces something other than a map
 */
export const loadFromProviders = (
    providers: readonly unknown[],
    registry: Registry | undefined,
    logger: Logger
): ConfigMap => {
    let merged: ConfigMap = {};

    for (const descriptor of providers) {
        const provider = resolveProvider(descriptor, registry);
        logger.debug(`Invoking config provider: ${provider.name}`);

        const result = provider.provide();

        if (isFragmentMap(result) || Array.isArray(result) || !isIterable(result)) {
            merged = mergeFragment(merged, result, provider);
            continue;
        }

        let count = 0;
        for (const fragment of result) {
            merged = mergeFragment(merged, fragment, provider);
            count++;
        }
        logger.debug(`Provider ${provider.name} yielded ${count} config fragment(s)`);
    }

    return merged;
};
