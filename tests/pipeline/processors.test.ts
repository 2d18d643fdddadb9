import { describe, expect, test, vi } from 'vitest';
import { InvalidProcessorError } from '../../src/error/InvalidProcessorError';
import { postProcess } from '../../src/pipeline/processors';
import { createRegistry } from '../../src/resolve';
import type { ConfigMap, Logger } from '../../src/types';

const mockLogger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    silly: vi.fn(),
};

describe('postProcess', () => {
    test('should return the configuration untouched without processors', () => {
        const config = { a: 1 };

        expect(postProcess([], config, undefined, mockLogger)).toBe(config);
    });

    test('should feed each processor the output of the previous one', () => {
        const addCount = (config: ConfigMap): ConfigMap => ({ ...config, count: 1 });
        const doubleCount = (config: ConfigMap): ConfigMap => ({
            ...config,
            count: typeof config.count === 'number' ? config.count * 2 : 0,
        });

        expect(postProcess([addCount, doubleCount], {}, undefined, mockLogger)).toEqual({ count: 2 });
        expect(postProcess([doubleCount, addCount], {}, undefined, mockLogger)).toEqual({ count: 1 });
    });

    test('should let a processor return an entirely different map', () => {
        expect(postProcess([() => ({ processor: 'closure' })], { foo: 'bar' }, undefined, mockLogger))
            .toEqual({ processor: 'closure' });
    });

    test('should resolve named processors through the registry', () => {
        const registry = createRegistry().register('Mark', () => ({
            process: (config: ConfigMap) => ({ ...config, marked: true }),
        }));

        expect(postProcess(['Mark'], { a: 1 }, registry, mockLogger)).toEqual({ a: 1, marked: true });
    });

    test('should propagate processor failures', () => {
        const failing = () => {
            throw new Error('processor exploded');
        };

        expect(() => postProcess([failing], {}, undefined, mockLogger)).toThrow('processor exploded');
    });

    test('should reject processors that cannot be resolved', () => {
        expect(() => postProcess(['Missing'], {}, createRegistry(), mockLogger)).toThrow(InvalidProcessorError);
        expect(() => postProcess([{}], {}, undefined, mockLogger)).toThrow(InvalidProcessorError);
    });
});
