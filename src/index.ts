export * from './types';
export { ConfigAggregator, create } from './aggregator';
export { parseCacheRecord, renderCacheRecord, tryLoad, trySave, type CacheOptions } from './cache';
export { applyArgs, configure, validateCacheFile, type CacheArgs } from './configure';
export { CACHE_FILEMODE, DEFAULT_CACHE_FILE_MODE, DEFAULT_LOGGER, ENABLE_CACHE, GENERATOR_NAME } from './constants';
export * from './error/index';
export { isDirective, remove, replace, RemoveDirective, ReplaceDirective, type Directive } from './merge/directives';
export { isTree, merge, mergeTree } from './merge/merge';
export { postProcess } from './pipeline/processors';
export { loadFromProviders } from './pipeline/providers';
export { arrayProvider } from './providers/array';
export { yamlFileProvider, type YamlFileProviderOptions } from './providers/yaml-file';
export { createRegistry, describeType, describeValue, resolveProcessor, resolveProvider, type Factory, type Registry } from './resolve';
