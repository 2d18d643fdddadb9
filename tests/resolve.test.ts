import { describe, expect, test, vi } from 'vitest';
import { InvalidProcessorError } from '../src/error/InvalidProcessorError';
import { InvalidProviderError } from '../src/error/InvalidProviderError';
import { createRegistry, describeType, describeValue, resolveProcessor, resolveProvider } from '../src/resolve';

class DatabaseConfig {
    provide() {
        return { db: { host: this.host } };
    }

    private readonly host = 'localhost';
}

class AddTimestamp {
    process(config: Record<string, unknown>) {
        return { ...config, stamped: this.stamp };
    }

    private readonly stamp = true;
}

describe('createRegistry', () => {
    test('should build registered entries on demand', () => {
        const factory = vi.fn(() => ({ provide: () => ({}) }));
        const registry = createRegistry().register('Example', factory);

        expect(registry.has('Example')).toBe(true);
        expect(factory).not.toHaveBeenCalled();

        registry.create('Example');
        registry.create('Example');

        expect(factory).toHaveBeenCalledTimes(2);
    });

    test('should throw when creating an unknown entry', () => {
        expect(createRegistry().has('Missing')).toBe(false);
        expect(() => createRegistry().create('Missing')).toThrow("No factory registered for 'Missing'");
    });
});

describe('describeValue', () => {
    test('should name functions', () => {
        function namedProvider() {
            return {};
        }

        expect(describeValue(namedProvider)).toBe('function namedProvider');
        expect(describeValue(Object.defineProperty(() => ({}), 'name', { value: '' }))).toBe('anonymous function');
    });

    test('should return strings as they are', () => {
        expect(describeValue('DatabaseConfig')).toBe('DatabaseConfig');
    });

    test('should fall back to the type for other values', () => {
        expect(describeValue(new DatabaseConfig())).toBe('DatabaseConfig');
        expect(describeValue(42)).toBe('number');
    });
});

describe('describeType', () => {
    test('should name the type of a value', () => {
        expect(describeType(null)).toBe('null');
        expect(describeType(undefined)).toBe('undefined');
        expect(describeType([])).toBe('array');
        expect(describeType({})).toBe('object');
        expect(describeType(Object.create(null))).toBe('object');
        expect(describeType(new Map())).toBe('Map');
        expect(describeType('text')).toBe('string');
        expect(describeType(true)).toBe('boolean');
    });
});

describe('resolveProvider', () => {
    test('should wrap a function provider', () => {
        function appConfig() {
            return { app: 'demo' };
        }

        const provider = resolveProvider(appConfig);

        expect(provider.name).toBe('function appConfig');
        expect(provider.provide()).toEqual({ app: 'demo' });
    });

    test('should call provide() on an invokable object with its own this', () => {
        const provider = resolveProvider(new DatabaseConfig());

        expect(provider.name).toBe('DatabaseConfig');
        expect(provider.provide()).toEqual({ db: { host: 'localhost' } });
    });

    test('should build a named provider through the registry', () => {
        const registry = createRegistry().register('DatabaseConfig', () => new DatabaseConfig());
        const provider = resolveProvider('DatabaseConfig', registry);

        expect(provider.name).toBe('DatabaseConfig');
        expect(provider.provide()).toEqual({ db: { host: 'localhost' } });
    });

    test('should reject an unregistered name', () => {
        expect(() => resolveProvider('Missing', createRegistry())).toThrow(InvalidProviderError);
        expect(() => resolveProvider('Missing')).toThrow(
            'Cannot resolve provider "Missing": no provider factory is registered under that name'
        );
    });

    test('should reject values that cannot be invoked', () => {
        expect(() => resolveProvider(42)).toThrow(
            'Cannot use provider of type number: it must be a function or expose a provide() method'
        );
        expect(() => resolveProvider({ provide: 'nope' })).toThrow(InvalidProviderError);
    });

    test('should reject a registered factory that builds something not invokable', () => {
        const registry = createRegistry().register('Broken', () => ({ settings: true }));

        expect(() => resolveProvider('Broken', registry)).toThrow(
            'Cannot use provider of type object: it must be a function or expose a provide() method'
        );
    });
});

describe('resolveProcessor', () => {
    test('should wrap a function processor', () => {
        const processor = resolveProcessor((config: Record<string, unknown>) => ({ ...config, processed: true }));

        expect(processor.process({ a: 1 })).toEqual({ a: 1, processed: true });
    });

    test('should call process() on an invokable object', () => {
        const processor = resolveProcessor(new AddTimestamp());

        expect(processor.name).toBe('AddTimestamp');
        expect(processor.process({ a: 1 })).toEqual({ a: 1, stamped: true });
    });

    test('should build a named processor through the registry', () => {
        const registry = createRegistry().register('AddTimestamp', () => new AddTimestamp());

        expect(resolveProcessor('AddTimestamp', registry).process({})).toEqual({ stamped: true });
    });

    test('should reject an unregistered name', () => {
        expect(() => resolveProcessor('Missing')).toThrow(InvalidProcessorError);
        expect(() => resolveProcessor('Missing')).toThrow(
            'Cannot resolve processor "Missing": no processor factory is registered under that name'
        );
    });

    test('should reject values that cannot be invoked', () => {
        expect(() => resolveProcessor(null)).toThrow(
            'Cannot use processor of type null: it must be a function or expose a process() method'
        );
    });
});
