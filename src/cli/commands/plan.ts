/**
 * `api-test-agent plan` — Ask the LLM for a test plan and print it.
 *
 * Dependency direction: plan.ts → commander, ora, workflow controller
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import ora from 'ora';
import { renderCompletion } from '../../core/workflow/controller.js';
import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function createPlanCommand(getContext: () => AppContext): Command {
    return new Command('plan')
        .description('Generate a test plan for the API')
        .action(async () => {
            const { controller } = getContext();

            const spinner = ora('Fetching a test plan from the LLM...').start();
            const result = await controller.plan();
            if (result.ok) {
                spinner.succeed('Test plan received');
            } else {
                spinner.fail('Could not fetch a test plan');
            }

            logger.header('Test Plan');
            console.log(renderCompletion(result));
            logger.header('End of Test Plan');
        });
}
