export type FileSystemErrorType =
    | 'not_readable'
    | 'parse_failed'
    | 'invalid_format'
    | 'lock_held'
    | 'operation_failed';

/**
 * Error raised for cache file access. Failures while reading a cache file are
 * fatal to the caller; failures while writing one are caught by the cache store.
 */
export class FileSystemError extends Error {
    public readonly name = 'FileSystemError';

    constructor(
        public readonly errorType: FileSystemErrorType,
        message: string,
        public readonly path: string,
        public readonly operation: string,
        public readonly originalError?: Error
    ) {
        super(message);
        Object.setPrototypeOf(this, FileSystemError.prototype);
    }

    static cacheNotReadable(path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'not_readable',
            `Failed to read configuration cache: ${originalError.message || 'Unknown error'}`,
            path,
            'cache_read',
            originalError
        );
    }

    static cacheParseFailed(path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'parse_failed',
            `Configuration cache is corrupt: ${originalError.message || 'Unknown error'}`,
            path,
            'cache_parse',
            originalError
        );
    }

    static cacheInvalidFormat(path: string, receivedType: string): FileSystemError {
        return new FileSystemError(
            'invalid_format',
            `Configuration cache does not contain a configuration map (found ${receivedType})`,
            path,
            'cache_parse'
        );
    }

    static lockHeld(path: string): FileSystemError {
        return new FileSystemError('lock_held', 'Cache file is locked by another writer', path, 'lock_acquire');
    }

    static operationFailed(operation: string, path: string, originalError: Error): FileSystemError {
        return new FileSystemError(
            'operation_failed',
            `Failed to ${operation}: ${originalError.message || 'Unknown error'}`,
            path,
            operation,
            originalError
        );
    }
}
