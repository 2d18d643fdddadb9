import type { Command } from "commander";
import { ArgumentError } from "./error/ArgumentError";
import type { AggregatorOptions } from "./types";
export { ArgumentError };

/**
 * Command-line values read by {@link applyArgs}, as produced by
 * `command.opts()` after {@link configure}.
 */
export interface CacheArgs {
    cacheFile?: string;
    /** false when --no-cache was given */
    cache?: boolean;
}

/**
 * Validates a cache file path given on the command line.
 *
 * @param cacheFile - The path to validate
 * @returns The trimmed path
 * @throws {ArgumentError} When the path is empty or contains a null character
 */
export function validateCacheFile(cacheFile: string): string {
    if (typeof cacheFile !== 'string') {
        throw new ArgumentError('cacheFile', 'Cache file must be a string');
    }

    const trimmed = cacheFile.trim();
    if (trimmed.length === 0) {
        throw new ArgumentError('cacheFile', 'Cache file cannot be empty or whitespace only');
    }

    if (trimmed.includes('\0')) {
        throw new ArgumentError('cacheFile', 'Cache file contains invalid null character');
    }

    return trimmed;
}

/**
 * Adds the cache options to a Commander.js command:
 * - `--cache-file <path>`: use this configuration cache file
 * - `--no-cache`: neither read nor write the configuration cache
 *
 * @param command - The Commander.js Command instance to configure
 * @returns The configured Command instance
 * @throws {ArgumentError} When command is not a Commander.js Command
 *
 * @example
 * ```typescript
 * const program = configure(new Command());
 * program.parse();
 * const aggregator = new ConfigAggregator(applyArgs({ providers, cacheFile: 'cache/config.yaml' }, program.opts()));
 * ```
 */
export const configure = (command: Command): Command => {
    if (!command || typeof command.option !== 'function') {
        throw new ArgumentError('command', 'Command must be a valid Commander.js Command instance');
    }

    return command
        .option(
            '--cache-file <cacheFile>',
            'Configuration cache file path',
            (value: string) => {
                try {
                    return validateCacheFile(value);
                } catch (error) {
                    if (error instanceof ArgumentError) {
                        throw new ArgumentError('cache-file', `Invalid --cache-file: ${error.message}`);
                    }
                    throw error;
                }
            }
        )
        .option('--no-cache', 'Do not read or write the configuration cache');
}

/**
 * Applies command-line cache overrides to aggregator options.
 * `--no-cache` wins over `--cache-file`.
 */
export const applyArgs = (options: AggregatorOptions, args: CacheArgs): AggregatorOptions => {
    if (args.cache === false) {
        return { ...options, cacheFile: undefined };
    }
    if (args.cacheFile) {
        return { ...options, cacheFile: args.cacheFile };
    }
    return options;
}
