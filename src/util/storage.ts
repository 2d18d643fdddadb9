import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { FileSystemError } from '../error/FileSystemError';

export interface AtomicWriteOptions {
    /** Permission mode applied to the file before it is moved into place */
    mode: number;
    encoding?: BufferEncoding;
}

/**
 * Synchronous file access used by the cache store.
 */
export interface Utility {
    exists: (filePath: string) => boolean;
    readFile: (filePath: string, encoding: BufferEncoding) => string;
    /**
     * Writes `content` to a temporary file next to `filePath`, applies the mode
     * and renames it over `filePath`. Readers see the old file or the new one,
     * never a partial write.
     */
    writeFileAtomic: (filePath: string, content: string, options: AtomicWriteOptions) => void;
    /**
     * Runs `fn` while holding `lockPath`, created exclusively. A lock older than
     * `staleAfterMs` is treated as abandoned and taken over.
     *
     * @throws {FileSystemError} When another writer holds the lock
     */
    withLock: <T>(lockPath: string, staleAfterMs: number, fn: () => T) => T;
}

const errorCode = (error: unknown): string | undefined => {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
};

const toError = (error: unknown): Error => error instanceof Error ? error : new Error(String(error));

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => { });

    const exists = (filePath: string): boolean => fs.existsSync(filePath);

    const readFile = (filePath: string, encoding: BufferEncoding): string => fs.readFileSync(filePath, { encoding });

    const removeQuietly = (filePath: string): void => {
        try {
            fs.unlinkSync(filePath);
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') {
                log(`Could not remove ${filePath}: ${toError(error).message}`);
            }
        }
    };

    const writeFileAtomic = (filePath: string, content: string, options: AtomicWriteOptions): void => {
        const dir = path.dirname(filePath);
        const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);

        log(`Writing ${filePath} through ${tempPath}`);
        try {
            fs.writeFileSync(tempPath, content, { encoding: options.encoding ?? 'utf8', mode: options.mode, flag: 'wx' });
            // the mode given to writeFileSync is filtered by the umask
            fs.chmodSync(tempPath, options.mode);
            fs.renameSync(tempPath, filePath);
        } catch (error) {
            removeQuietly(tempPath);
            throw FileSystemError.operationFailed('write cache file', filePath, toError(error));
        }
    };

    const acquire = (lockPath: string, staleAfterMs: number, retried: boolean): number => {
        try {
            return fs.openSync(lockPath, 'wx');
        } catch (error) {
            if (errorCode(error) !== 'EEXIST') {
                throw FileSystemError.operationFailed('acquire cache lock', lockPath, toError(error));
            }
        }

        if (!retried) {
            let age = 0;
            try {
                age = Date.now() - fs.statSync(lockPath).mtimeMs;
            } catch (error) {
                // the holder released it between our open and stat
                log(`Lock ${lockPath} vanished: ${toError(error).message}`);
                return acquire(lockPath, staleAfterMs, true);
            }
            if (age > staleAfterMs) {
                log(`Taking over stale lock ${lockPath} (${age}ms old)`);
                removeQuietly(lockPath);
                return acquire(lockPath, staleAfterMs, true);
            }
        }

        throw FileSystemError.lockHeld(lockPath);
    };

    const withLock = <T>(lockPath: string, staleAfterMs: number, fn: () => T): T => {
        const fd = acquire(lockPath, staleAfterMs, false);
        try {
            return fn();
        } finally {
            fs.closeSync(fd);
            removeQuietly(lockPath);
        }
    };

    return {
        exists,
        readFile,
        writeFileAtomic,
        withLock,
    };
};
