/**
 * `api-test-agent config` — Show the effective configuration.
 *
 * Dependency direction: config.ts → commander, chalk, config module
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, getConfigPath } from '../../core/config/manager.js';
import { API_KEY_VARIABLE, TEST_API_URL_VARIABLE } from '../../core/config/environment.js';
import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function createConfigCommand(getContext: () => AppContext): Command {
    return new Command('config')
        .description('Show the effective configuration')
        .option('-p, --path', 'Show config file path only')
        .action((options: { path?: boolean }) => {
            const { projectRoot, config, environment } = getContext();
            const configPath = getConfigPath(projectRoot);

            if (options.path) {
                console.log(configPath);
                return;
            }

            logger.header('Current Configuration');
            console.log(
                chalk.gray(configExists(projectRoot) ? `File: ${configPath}` : 'No config file; using defaults'),
            );
            console.log(
                environment.apiKey
                    ? chalk.green(`  ✔ ${API_KEY_VARIABLE} is set`)
                    : chalk.red(`  ✘ ${API_KEY_VARIABLE} is not set`),
            );
            console.log(chalk.gray(`  ${TEST_API_URL_VARIABLE}=${environment.testApiUrl}`));
            console.log();
            console.log(JSON.stringify(config, null, 2));
        });
}
