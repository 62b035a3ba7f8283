/**
 * `api-test-agent run` — Run the generated tests and print a summary.
 *
 * Dependency direction: run.ts → commander, workflow controller
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import { renderRun } from '../../core/workflow/controller.js';
import type { AppContext } from '../context.js';

export function createRunCommand(getContext: () => AppContext): Command {
    return new Command('run')
        .description('Run the generated tests with the configured test runner')
        .action(async () => {
            const { controller } = getContext();
            const result = await controller.run();
            console.log(renderRun(result));
        });
}
