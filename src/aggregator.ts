import { tryLoad, trySave } from './cache';
import { DEFAULT_LOGGER } from './constants';
import { ArgumentError } from './error/ArgumentError';
import { postProcess } from './pipeline/processors';
import { loadFromProviders } from './pipeline/providers';
import type { Registry } from './resolve';
import {
    type AggregatorOptions,
    AggregatorOptionsSchema,
    type ConfigMap,
    type ConfigValue,
    type Logger,
    type ProcessorDescriptor,
    type ProviderDescriptor,
} from './types';

const deepFreeze = <T extends ConfigValue>(value: T): T => {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
};

/**
 * Checks the options and fills in defaults.
 *
 * @throws {ArgumentError} When an option has the wrong shape
 */
const normalizeOptions = (options: AggregatorOptions) => {
    const result = AggregatorOptionsSchema.safeParse(options);
    if (!result.success) {
        const issue = result.error.issues[0];
        const argument = issue.path.length ? issue.path.join('.') : 'options';
        throw new ArgumentError(argument, `Invalid aggregator option ${argument}: ${issue.message}`);
    }

    return {
        providers: options.providers ?? [],
        cacheFile: options.cacheFile,
        processors: options.processors ?? [],
        cacheFileMode: options.cacheFileMode,
        registry: options.registry,
        logger: options.logger ?? DEFAULT_LOGGER,
    };
};

/**
 * Aggregates configuration generated by configuration providers.
 *
 * Construction either loads the configuration from the cache file, or runs
 * the providers, then the processors, and writes the result to the cache file
 * when the result sets `config_cache_enabled`. The instance is immutable
 * afterwards.
 *
 * @example
 * ```typescript
 * const aggregator = new ConfigAggregator({
 *     providers: [
 *         () => ({ db: { host: 'localhost' } }),
 *         function* () {
 *             yield { db: { port: 5432 } };
 *             yield { features: ['search'] };
 *         },
 *     ],
 *     processors: [(config) => ({ ...config, 'post-processed': true })],
 *     cacheFile: 'data/cache/config.yaml',
 * });
 *
 * aggregator.mergedConfig();
 * // { db: { host: 'localhost', port: 5432 }, features: ['search'], 'post-processed': true }
 * ```
 */
export class ConfigAggregator {
    private readonly config: ConfigMap;

    /** Whether the configuration came from the cache file */
    public readonly fromCache: boolean;

    /** Cache file in use, if any */
    public readonly cacheFile?: string;

    constructor(options?: AggregatorOptions);
    /**
     * Positional form: providers, cache file, processors and cache file mode.
     */
    constructor(
        providers: ProviderDescriptor[],
        cacheFile?: string | null,
        processors?: ProcessorDescriptor[],
        cacheFileMode?: number | null
    );
    constructor(
        first: AggregatorOptions | ProviderDescriptor[] = {},
        cacheFile?: string | null,
        processors?: ProcessorDescriptor[],
        cacheFileMode?: number | null
    ) {
        const options = normalizeOptions(Array.isArray(first)
            ? {
                providers: first,
                cacheFile: cacheFile ?? undefined,
                processors,
                cacheFileMode: cacheFileMode ?? undefined,
            }
            : first);
        const { logger, registry } = options;
        this.cacheFile = options.cacheFile;

        const cached = tryLoad(options.cacheFile, { logger });
        if (cached) {
            logger.debug(`Configuration cache hit: ${options.cacheFile}`);
            this.config = deepFreeze(cached);
            this.fromCache = true;
            return;
        }

        this.config = deepFreeze(this.compute(options.providers, options.processors, registry, logger));
        this.fromCache = false;
        trySave(options.cacheFile, this.config, options.cacheFileMode, { logger });
    }

    private compute(
        providers: readonly unknown[],
        processors: readonly unknown[],
        registry: Registry | undefined,
        logger: Logger
    ): ConfigMap {
        logger.debug(`Aggregating configuration from ${providers.length} provider(s)`);
        const merged = loadFromProviders(providers, registry, logger);
        return postProcess(processors, merged, registry, logger);
    }

    /**
     * The aggregated configuration. It is frozen; copy it before changing it.
     */
    mergedConfig(): ConfigMap {
        return this.config;
    }
}

/**
 * Creates a {@link ConfigAggregator}.
 */
export const create = (options: AggregatorOptions = {}): ConfigAggregator => new ConfigAggregator(options);
