/**
 * Configuration manager — load, save, and validate the project config.
 *
 * A missing config file is not an error: the defaults apply. A config file
 * that exists but fails validation is.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands
 */

import { join, resolve } from 'node:path';
import { appConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { AppConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
    return issues.map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}

/**
 * Load and validate the configuration from disk.
 *
 * Fields left out of the file take their default values.
 *
 * @param projectRoot - The directory holding `.api-test-agent/`
 * @throws {ConfigError} if the file is invalid JSON or fails validation
 */
export function loadConfig(projectRoot: string): AppConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        logger.debug(`No config at ${configPath}, using defaults`);
        return structuredClone(DEFAULT_CONFIG);
    }

    logger.debug(`Loading config from ${configPath}`);

    const raw = readJsonFile(configPath);
    const result = appConfigSchema.safeParse(raw);

    if (!result.success) {
        throw new ConfigError(`Invalid configuration file:\n${formatIssues(result.error.issues)}`, {
            configPath,
            issues: result.error.issues,
        });
    }

    return result.data;
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails or write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): string {
    const result = appConfigSchema.safeParse(config);

    if (!result.success) {
        throw new ConfigError(
            `Cannot save invalid configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    const configPath = getConfigPath(projectRoot);
    writeJsonFile(configPath, result.data);
    logger.debug(`Config saved to ${configPath}`);
    return configPath;
}
