import type { FragmentMap, ProviderFunction } from '../types';

/**
 * Provider returning a fixed configuration fragment.
 *
 * @example
 * ```typescript
 * new ConfigAggregator({ providers: [arrayProvider({ debug: false })] });
 * ```
 */
export const arrayProvider = (config: FragmentMap): ProviderFunction => {
    const provideArray = () => config;
    return provideArray;
};
