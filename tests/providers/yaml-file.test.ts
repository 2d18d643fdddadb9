import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigAggregator } from '../../src/aggregator';
import { FileSystemError } from '../../src/error/FileSystemError';
import { ProviderReturnedInvalidConfigError } from '../../src/error/ProviderReturnedInvalidConfigError';
import { yamlFileProvider } from '../../src/providers/yaml-file';
import type { Logger } from '../../src/types';

describe('yamlFileProvider', () => {
    let tempDir: string;
    let mockLogger: Logger;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-aggregator-yaml-'));
        mockLogger = {
            debug: vi.fn(),
            info: vi.fn(),
            warn: vi.fn(),
            error: vi.fn(),
            verbose: vi.fn(),
            silly: vi.fn(),
        };
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    const writeConfig = (name: string, content: string): string => {
        const file = path.join(tempDir, name);
        fs.writeFileSync(file, content);
        return file;
    };

    test('should yield one fragment per file in order', () => {
        const global = writeConfig('global.yaml', 'level: info\nplugins:\n  - core\n');
        const local = writeConfig('local.yaml', 'level: debug\n');

        const fragments = [...yamlFileProvider([global, local], { logger: mockLogger })()];

        expect(fragments).toEqual([{ level: 'info', plugins: ['core'] }, { level: 'debug' }]);
        expect(mockLogger.debug).toHaveBeenCalledWith(`Loaded config file: ${global}`);
    });

    test('should skip files that do not exist', () => {
        const present = writeConfig('present.yaml', 'a: 1\n');
        const missing = path.join(tempDir, 'missing.yaml');

        const fragments = [...yamlFileProvider([missing, present], { logger: mockLogger })()];

        expect(fragments).toEqual([{ a: 1 }]);
        expect(mockLogger.debug).toHaveBeenCalledWith(`Config file does not exist: ${missing}`);
    });

    test('should yield an empty map for an empty document', () => {
        const empty = writeConfig('empty.yaml', '');
        const comments = writeConfig('comments.yaml', '# nothing here\n');

        expect([...yamlFileProvider([empty, comments])()]).toEqual([{}, {}]);
    });

    test('should reject a document that is not a mapping', () => {
        const list = writeConfig('list.yaml', '- a\n- b\n');

        expect(() => [...yamlFileProvider([list])()]).toThrow(ProviderReturnedInvalidConfigError);
        expect(() => [...yamlFileProvider([list])()]).toThrow(
            `Cannot read config from YAML file ${list}; it returned array instead of a configuration map`
        );
    });

    test('should raise a FileSystemError for malformed YAML', () => {
        const broken = writeConfig('broken.yaml', 'foo: [unclosed');

        try {
            [...yamlFileProvider([broken])()];
            expect.unreachable('should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(FileSystemError);
            if (error instanceof FileSystemError) {
                expect(error.operation).toBe('load config file');
                expect(error.path).toBe(broken);
            }
        }
    });

    test('should not read files until iterated', () => {
        const provide = yamlFileProvider([path.join(tempDir, 'later.yaml')], { logger: mockLogger });
        writeConfig('later.yaml', 'created: after\n');

        expect([...provide()]).toEqual([{ created: 'after' }]);
    });

    test('should let later files win when aggregated', () => {
        const global = writeConfig('global.yaml', 'db:\n  host: localhost\n  port: 5432\nplugins:\n  - core\n');
        const local = writeConfig('local.yaml', 'db:\n  host: db.internal\nplugins:\n  - extra\n');

        const aggregator = new ConfigAggregator({
            providers: [yamlFileProvider([global, local])],
            logger: mockLogger,
        });

        expect(aggregator.mergedConfig()).toEqual({
            db: { host: 'db.internal', port: 5432 },
            plugins: ['core', 'extra'],
        });
    });
});
