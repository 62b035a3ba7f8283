/**
 * `api-test-agent init` — Write the default configuration file.
 *
 * Dependency direction: init.ts → commander, config module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import { configExists, getConfigPath, saveConfig } from '../../core/config/manager.js';
import { DEFAULT_CONFIG } from '../../core/config/defaults.js';
import { logger } from '../../utils/logger.js';

export function createInitCommand(getProjectRoot: () => string): Command {
    return new Command('init')
        .description('Write a default configuration file to the current project')
        .option('-f, --force', 'Overwrite existing configuration')
        .action((options: { force?: boolean }) => {
            const projectRoot = getProjectRoot();

            if (configExists(projectRoot) && !options.force) {
                logger.error(`Configuration already exists at ${getConfigPath(projectRoot)}. Use --force to overwrite.`);
                process.exit(1);
            }

            const configPath = saveConfig(projectRoot, DEFAULT_CONFIG);
            logger.success(`Configuration saved to ${configPath}`);
        });
}
