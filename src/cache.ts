import * as yaml from 'js-yaml';
import {
    CACHE_FILEMODE,
    DEFAULT_CACHE_FILE_MODE,
    DEFAULT_ENCODING,
    DEFAULT_LOGGER,
    ENABLE_CACHE,
    GENERATOR_NAME,
    LOCK_SUFFIX,
} from './constants';
import { FileSystemError } from './error/FileSystemError';
import { isPlainObject } from './merge/merge';
import { describeType } from './resolve';
import { type ConfigMap, FileModeSchema, type Logger } from './types';
import * as Storage from './util/storage';

/** Age after which a leftover lock file is considered abandoned */
export const LOCK_STALE_MS = 30_000;

export interface CacheOptions {
    logger?: Logger;
}

const isConfigMap = (value: unknown): value is ConfigMap => isPlainObject(value);

/**
 * Renders the cache record: a comment header naming the generator and the
 * generation time, followed by the configuration as a YAML document.
 */
export const renderCacheRecord = (config: ConfigMap, generatedAt: Date = new Date()): string => {
    const header = `# This configuration cache file was generated by ${GENERATOR_NAME}
# at ${generatedAt.toISOString()}
`;
    const body = yaml.dump(config, {
        noRefs: true,
        lineWidth: -1,
    });
    return header + body;
};

/**
 * Parses a cache record back into a configuration map.
 *
 * @throws {FileSystemError} When the content is not valid YAML or not a mapping
 */
export const parseCacheRecord = (content: string, cacheFile: string): ConfigMap => {
    let parsed: unknown;
    try {
        parsed = yaml.load(content, { filename: cacheFile });
    } catch (error) {
        throw FileSystemError.cacheParseFailed(cacheFile, error instanceof Error ? error : new Error(String(error)));
    }

    if (!isConfigMap(parsed)) {
        throw FileSystemError.cacheInvalidFormat(cacheFile, describeType(parsed));
    }
    return parsed;
};

/**
 * Loads a cached configuration.
 *
 * @param cacheFile - Cache file path; nothing is loaded when unset
 * @returns The cached configuration, or undefined when there is no cache file
 * @throws {FileSystemError} When the file exists but cannot be read or parsed
 */
export const tryLoad = (cacheFile: string | undefined, options: CacheOptions = {}): ConfigMap | undefined => {
    const logger = options.logger ?? DEFAULT_LOGGER;
    if (!cacheFile) {
        return undefined;
    }

    const storage = Storage.create({ log: logger.debug });
    if (!storage.exists(cacheFile)) {
        logger.debug(`No configuration cache at ${cacheFile}`);
        return undefined;
    }

    let content: string;
    try {
        content = storage.readFile(cacheFile, DEFAULT_ENCODING);
    } catch (error) {
        throw FileSystemError.cacheNotReadable(cacheFile, error instanceof Error ? error : new Error(String(error)));
    }

    const config = parseCacheRecord(content, cacheFile);
    logger.verbose(`Loaded configuration from cache: ${cacheFile}`);
    return config;
};

const resolveFileMode = (config: ConfigMap, fileMode: number | undefined, logger: Logger): number => {
    if (fileMode !== undefined) {
        return fileMode;
    }

    const configured = config[CACHE_FILEMODE];
    if (configured === undefined || configured === null) {
        return DEFAULT_CACHE_FILE_MODE;
    }

    const result = FileModeSchema.safeParse(configured);
    if (!result.success) {
        logger.warn(`Ignoring invalid ${CACHE_FILEMODE} ${JSON.stringify(configured)}; using ${DEFAULT_CACHE_FILE_MODE.toString(8)}`);
        return DEFAULT_CACHE_FILE_MODE;
    }
    return result.data;
};

/**
 * Writes the configuration to the cache file when the configuration enables
 * caching through its `config_cache_enabled` key.
 *
 * The record is written to a temporary file and renamed into place while a
 * `<cacheFile>.lock` file is held. Any failure is logged and swallowed: the
 * configuration in memory stays valid, it is simply recomputed next time.
 *
 * @param cacheFile - Cache file path; nothing is written when unset
 * @param config - Merged configuration
 * @param fileMode - Permission mode; defaults to `config_cache_filemode`, then 0644
 * @returns Whether the cache file was written
 */
export const trySave = (
    cacheFile: string | undefined,
    config: ConfigMap,
    fileMode?: number,
    options: CacheOptions = {}
): boolean => {
    const logger = options.logger ?? DEFAULT_LOGGER;
    if (!cacheFile) {
        return false;
    }

    if (!config[ENABLE_CACHE]) {
        logger.debug(`Configuration caching disabled; not writing ${cacheFile}`);
        return false;
    }

    const storage = Storage.create({ log: logger.debug });
    try {
        const mode = resolveFileMode(config, fileMode, logger);
        const content = renderCacheRecord(config);
        storage.withLock(`${cacheFile}${LOCK_SUFFIX}`, LOCK_STALE_MS, () => {
            storage.writeFileAtomic(cacheFile, content, { mode, encoding: DEFAULT_ENCODING });
        });
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Unable to write configuration cache ${cacheFile}: ${message}`);
        return false;
    }

    logger.verbose(`Wrote configuration cache: ${cacheFile}`);
    return true;
};
