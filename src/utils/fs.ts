/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: document loaders, distribution aggregate, settings manager
 */

import { cpSync, existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { AlreadyExistsError, NotFoundError } from '../core/errors.js';

/** Narrow an unknown thrown value to a Node system error with the given code. */
function hasErrorCode(err: unknown, code: string): boolean {
    return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Check if a file (or anything else) exists at the given path.
 */
export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

/**
 * Check if a directory exists at the given path.
 */
export function directoryExists(dirPath: string): boolean {
    const absolutePath = resolve(dirPath);
    return existsSync(absolutePath) && statSync(absolutePath).isDirectory();
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
    const absolutePath = resolve(dirPath);
    if (!existsSync(absolutePath)) {
        mkdirSync(absolutePath, { recursive: true });
    }
}

/**
 * Read a text file and return its contents.
 * @throws {NotFoundError} if the path doesn't exist or is not a regular file.
 */
export function readTextFile(filePath: string): string {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath) || !statSync(absolutePath).isFile()) {
        throw new NotFoundError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    return readFileSync(absolutePath, 'utf-8');
}

/**
 * Write a text file.
 *
 * Without `overwrite` the file is opened with the exclusive-create flag, so
 * the existence check and the creation are a single operation. With
 * `overwrite` the file is truncated first; a failed write leaves it partial.
 *
 * @throws {AlreadyExistsError} if the file exists and `overwrite` is false.
 */
export function writeTextFile(filePath: string, content: string, overwrite: boolean = false): void {
    const absolutePath = resolve(filePath);

    try {
        writeFileSync(absolutePath, content, { encoding: 'utf-8', flag: overwrite ? 'w' : 'wx' });
    } catch (err) {
        if (hasErrorCode(err, 'EEXIST')) {
            throw new AlreadyExistsError(`${absolutePath} already exists`, { filePath: absolutePath });
        }
        throw err;
    }
}

/**
 * Recursively copy a directory tree to a destination that must not exist yet.
 * @throws {NotFoundError} if the source directory is missing.
 * @throws {AlreadyExistsError} if the destination exists.
 */
export function copyDirectory(sourceDir: string, targetDir: string): void {
    const source = resolve(sourceDir);
    const target = resolve(targetDir);

    if (!directoryExists(source)) {
        throw new NotFoundError(`Template directory not found: ${source}`, { sourceDir: source });
    }
    if (existsSync(target)) {
        throw new AlreadyExistsError(`${target} already exists!`, { targetDir: target });
    }

    cpSync(source, target, { recursive: true, errorOnExist: true, force: false });
}

/**
 * List the names of the immediate subdirectories of a directory, sorted.
 * @throws {NotFoundError} if the directory is missing.
 */
export function listSubdirectories(dirPath: string): string[] {
    const absolutePath = resolve(dirPath);

    if (!directoryExists(absolutePath)) {
        throw new NotFoundError(`Directory not found: ${absolutePath}`, { dirPath: absolutePath });
    }

    return readdirSync(absolutePath, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
}
