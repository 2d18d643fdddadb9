import type { Logger } from "./types";

/** Name written into the header of generated cache files */
export const GENERATOR_NAME = 'config-aggregator';

/** Reserved key: a truthy value enables writing the merged configuration to the cache file */
export const ENABLE_CACHE = 'config_cache_enabled';

/** Reserved key: numeric permission mode for the written cache file */
export const CACHE_FILEMODE = 'config_cache_filemode';

/** Permission mode of a cache file when none is configured */
export const DEFAULT_CACHE_FILE_MODE = 0o644;

/** Encoding of cache files */
export const DEFAULT_ENCODING = 'utf8';

/** Suffix of the lock file held while a cache file is written */
export const LOCK_SUFFIX = '.lock';

/**
 * Default logger implementation using console methods.
 * The verbose and silly methods are no-ops to avoid excessive output.
 */
export const DEFAULT_LOGGER: Logger = {
    // eslint-disable-next-line no-console
    debug: console.debug,
    // eslint-disable-next-line no-console
    info: console.info,
    // eslint-disable-next-line no-console
    warn: console.warn,
    // eslint-disable-next-line no-console
    error: console.error,

    verbose: () => { },

    silly: () => { },
}
