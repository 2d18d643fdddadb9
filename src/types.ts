import { z } from 'zod';
import type { Directive } from './merge/directives';
import type { Registry } from './resolve';

/** Leaf values a configuration tree can hold. */
export type ConfigScalar = string | number | boolean | null;

/**
 * Keyed node of a configuration tree. Keys that are the canonical decimal form
 * of a non-negative integer ("0", "12") are list keys: they are appended, not
 * overwritten, when two trees are merged.
 */
export interface ConfigMap {
    [key: string]: ConfigValue;
}

/** Ordered node of a configuration tree; its indices are list keys. */
export type ConfigList = ConfigValue[];

export type ConfigTree = ConfigMap | ConfigList;

export type ConfigValue = ConfigScalar | ConfigTree;

/**
 * A configuration tree as produced by a provider. Any value may carry a merge
 * directive; `undefined` is read as an absent key.
 */
export interface FragmentMap {
    [key: string]: FragmentValue;
}

export type FragmentList = FragmentValue[];

export type FragmentTree = FragmentMap | FragmentList;

export type FragmentValue = ConfigScalar | FragmentTree | Directive | undefined;

/**
 * Source of configuration. Returns one fragment, or an iterable (a generator
 * included) whose fragments are merged one by one in the order they are yielded.
 */
export type ProviderFunction = () => FragmentMap | Iterable<FragmentMap>;

/** Object form of a provider, e.g. an instance produced by a registry factory. */
export interface InvokableProvider {
    provide: ProviderFunction;
}

export type Provider = ProviderFunction | InvokableProvider;

/** Transforms the fully merged configuration. */
export type ProcessorFunction = (config: ConfigMap) => ConfigMap;

/** Object form of a processor. */
export interface InvokableProcessor {
    process: ProcessorFunction;
}

export type Processor = ProcessorFunction | InvokableProcessor;

/** A provider, or the name of a provider factory held by the registry. */
export type ProviderDescriptor = Provider | string;

/** A processor, or the name of a processor factory held by the registry. */
export type ProcessorDescriptor = Processor | string;

/**
 * Logger interface for the aggregator's internal logging.
 * Compatible with popular logging libraries like Winston, Bunyan, etc.
 */
export interface Logger {
    /** Debug-level logging for detailed troubleshooting information */
    debug: (message: string, ...args: unknown[]) => void;
    /** Info-level logging for general information */
    info: (message: string, ...args: unknown[]) => void;
    /** Warning-level logging for non-critical issues */
    warn: (message: string, ...args: unknown[]) => void;
    /** Error-level logging for critical problems */
    error: (message: string, ...args: unknown[]) => void;
    /** Verbose-level logging for extensive detail */
    verbose: (message: string, ...args: unknown[]) => void;
    /** Silly-level logging for maximum detail */
    silly: (message: string, ...args: unknown[]) => void;
}

/**
 * Options accepted by the aggregator.
 */
export interface AggregatorOptions {
    /** Providers, invoked in order. Defaults to none. */
    providers?: ProviderDescriptor[];
    /** Cache file; configuration is loaded from it if present and written to it if not. */
    cacheFile?: string;
    /** Processors applied to the merged configuration, in order. Defaults to none. */
    processors?: ProcessorDescriptor[];
    /** Permission mode of a written cache file; takes precedence over the config_cache_filemode key. */
    cacheFileMode?: number;
    /** Factories for string provider and processor descriptors. */
    registry?: Registry;
    /** Logger instance; defaults to a console logger. */
    logger?: Logger;
}

/** Permission bits accepted for a cache file. */
export const FileModeSchema = z.number().int().min(0).max(0o7777);

/**
 * Shape check for {@link AggregatorOptions}. Descriptors are left to
 * `resolveProvider` and `resolveProcessor`, which raise the provider and
 * processor errors.
 */
export const AggregatorOptionsSchema = z.object({
    providers: z.array(z.unknown()).optional(),
    cacheFile: z.string().min(1, 'Cache file path cannot be empty').optional(),
    processors: z.array(z.unknown()).optional(),
    cacheFileMode: FileModeSchema.optional(),
    registry: z.custom<object>((value) => value !== null && typeof value === 'object').optional(),
    logger: z.custom<object>((value) => value !== null && typeof value === 'object').optional(),
});
