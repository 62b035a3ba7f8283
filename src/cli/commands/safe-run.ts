/**
 * `api-test-agent safe-run` — Run the tests; on failure send the output back
 * as feedback, regenerate once, and run again.
 *
 * Dependency direction: safe-run.ts → commander, reflection loop
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import { reflectionOperations, runWithReflection } from '../../core/workflow/reflection.js';
import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function createSafeRunCommand(getContext: () => AppContext): Command {
    return new Command('safe-run')
        .description('Run the tests with a single regenerate-and-retry pass if they fail')
        .action(async () => {
            const { controller } = getContext();
            const report = await runWithReflection(reflectionOperations(controller));

            if (report.passed) {
                logger.success(`Tests passed after ${report.runs} run(s)`);
            } else {
                logger.warn('Tests still failing after one reflection attempt');
            }
            console.log(report.text);
        });
}
