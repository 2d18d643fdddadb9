import { InvalidProcessorError } from './error/InvalidProcessorError';
import { InvalidProviderError } from './error/InvalidProviderError';
import type { ConfigMap } from './types';

/** Zero-argument factory building a provider or processor on demand. */
export type Factory = () => unknown;

/**
 * Name-to-factory table used to resolve string descriptors. It stands in for
 * constructing a provider or processor class from its name.
 */
export interface Registry {
    register: (name: string, factory: Factory) => Registry;
    has: (name: string) => boolean;
    create: (name: string) => unknown;
}

/** A provider ready to run, together with the name used in error messages. */
export interface ResolvedProvider {
    name: string;
    provide: () => unknown;
}

export interface ResolvedProcessor {
    name: string;
    process: (config: ConfigMap) => ConfigMap;
}

/**
 * Creates an empty registry.
 *
 * @example
 * ```typescript
 * const registry = createRegistry()
 *     .register('DatabaseConfig', () => new DatabaseConfigProvider())
 *     .register('strip-secrets', () => stripSecrets);
 *
 * new ConfigAggregator({ providers: ['DatabaseConfig'], processors: ['strip-secrets'], registry });
 * ```
 */
export const createRegistry = (): Registry => {
    const factories = new Map<string, Factory>();

    const registry: Registry = {
        register: (name, factory) => {
            factories.set(name, factory);
            return registry;
        },
        has: (name) => factories.has(name),
        create: (name) => {
            const factory = factories.get(name);
            if (!factory) {
                throw new Error(`No factory registered for '${name}'`);
            }
            return factory();
        },
    };

    return registry;
};

/**
 * Names the type of a value for error messages: `null`, `array`, the class
 * name of an instance, `object`, or the `typeof` result.
 */
export const describeType = (value: unknown): string => {
    if (value === null) {
        return 'null';
    }
    if (Array.isArray(value)) {
        return 'array';
    }
    if (typeof value === 'object') {
        const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
        if (typeof ctor === 'function' && ctor.name && ctor !== Object) {
            return ctor.name;
        }
        return 'object';
    }
    return typeof value;
};

/**
 * Names a provider or processor for error messages: `function <name>`, the
 * registered name for strings, otherwise its type.
 */
export const describeValue = (value: unknown): string => {
    if (typeof value === 'function') {
        return value.name ? `function ${value.name}` : 'anonymous function';
    }
    if (typeof value === 'string') {
        return value;
    }
    return describeType(value);
};

const hasMethod = <K extends string>(value: unknown, method: K): value is Record<K, Function> =>
    typeof value === 'object' && value !== null && method in value && typeof Reflect.get(value, method) === 'function';

/**
 * Resolves a provider descriptor. Strings are looked up in the registry and the
 * factory's product is checked like any other candidate.
 *
 * @throws {InvalidProviderError} When the name is unknown or the candidate is not invokable
 */
export const resolveProvider = (descriptor: unknown, registry?: Registry): ResolvedProvider => {
    let candidate: unknown = descriptor;
    let name = describeValue(descriptor);

    if (typeof descriptor === 'string') {
        if (!registry || !registry.has(descriptor)) {
            throw InvalidProviderError.fromNamedProvider(descriptor);
        }
        candidate = registry.create(descriptor);
        name = descriptor;
    }

    if (typeof candidate === 'function') {
        const fn = candidate;
        return { name, provide: (): unknown => Reflect.apply(fn, undefined, []) };
    }

    if (hasMethod(candidate, 'provide')) {
        const target = candidate;
        return { name, provide: (): unknown => Reflect.apply(target.provide, target, []) };
    }

    throw InvalidProviderError.fromUnsupportedType(describeType(candidate));
};

/**
 * Resolves a processor descriptor the same way as {@link resolveProvider}.
 *
 * @throws {InvalidProcessorError} When the name is unknown or the candidate is not invokable
 */
export const resolveProcessor = (descriptor: unknown, registry?: Registry): ResolvedProcessor => {
    let candidate: unknown = descriptor;
    let name = describeValue(descriptor);

    if (typeof descriptor === 'string') {
        if (!registry || !registry.has(descriptor)) {
            throw InvalidProcessorError.fromNamedProcessor(descriptor);
        }
        candidate = registry.create(descriptor);
        name = descriptor;
    }

    if (typeof candidate === 'function') {
        const fn = candidate;
        return { name, process: (config) => Reflect.apply(fn, undefined, [config]) };
    }

    if (hasMethod(candidate, 'process')) {
        const target = candidate;
        return { name, process: (config) => Reflect.apply(target.process, target, [config]) };
    }

    throw InvalidProcessorError.fromUnsupportedType(describeType(candidate));
};
