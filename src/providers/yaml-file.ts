import * as yaml from 'js-yaml';
import { DEFAULT_ENCODING } from '../constants';
import { FileSystemError } from '../error/FileSystemError';
import { ProviderReturnedInvalidConfigError } from '../error/ProviderReturnedInvalidConfigError';
import { isFragmentMap } from '../merge/merge';
import { describeType } from '../resolve';
import type { FragmentMap, Logger } from '../types';
import * as Storage from '../util/storage';

export interface YamlFileProviderOptions {
    /** File encoding for reading configuration files */
    encoding?: BufferEncoding;
    /** Logger for debugging */
    logger?: Logger;
}

/**
 * Provider reading YAML configuration files, one fragment per file.
 *
 * Files are read lazily and yielded in the order given, so later files take
 * precedence over earlier ones. Missing files are skipped and an empty
 * document counts as an empty mapping.
 *
 * @param files - Paths of the YAML files, lowest precedence first
 * @throws {FileSystemError} When a file exists but cannot be read or parsed
 * @throws {ProviderReturnedInvalidConfigError} When a document is not a mapping
 *
 * @example
 * ```typescript
 * new ConfigAggregator({
 *     providers: [yamlFileProvider(['config/global.yaml', 'config/local.yaml'])],
 * });
 * ```
 */
export const yamlFileProvider = (files: readonly string[], options: YamlFileProviderOptions = {}) => {
    const encoding = options.encoding ?? DEFAULT_ENCODING;
    const logger = options.logger;

    return function* provideYamlFiles(): Generator<FragmentMap> {
        const storage = Storage.create({ log: logger?.debug });

        for (const file of files) {
            if (!storage.exists(file)) {
                logger?.debug(`Config file does not exist: ${file}`);
                continue;
            }

            let parsed: unknown;
            try {
                parsed = yaml.load(storage.readFile(file, encoding), { filename: file });
            } catch (error) {
                throw FileSystemError.operationFailed('load config file', file, error instanceof Error ? error : new Error(String(error)));
            }

            if (parsed === undefined || parsed === null) {
                logger?.debug(`Config file is empty: ${file}`);
                yield {};
                continue;
            }

            if (!isFragmentMap(parsed)) {
                throw new ProviderReturnedInvalidConfigError(`YAML file ${file}`, describeType(parsed));
            }

            logger?.debug(`Loaded config file: ${file}`);
            yield parsed;
        }
    };
};
