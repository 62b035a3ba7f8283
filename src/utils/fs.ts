/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, workflow controller
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ConfigError, WriteError } from '../core/errors.js';

/**
 * Read a JSON file and parse it. The caller validates the shape.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    try {
        const content = readFileSync(absolutePath, 'utf-8');
        return JSON.parse(content);
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Write data to a JSON file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    const absolutePath = resolve(filePath);

    try {
        mkdirSync(dirname(absolutePath), { recursive: true });
        writeFileSync(absolutePath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: err instanceof Error ? err.message : String(err),
        });
    }
}

/**
 * Replace a text file's contents in one write. The parent directory must exist.
 * @throws {WriteError} if the write fails.
 */
export function writeTextFile(filePath: string, content: string): void {
    try {
        writeFileSync(filePath, content, 'utf-8');
    } catch (err) {
        throw new WriteError(filePath, err);
    }
}

export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}
