/**
 * `api-test-agent feedback <text...>` — Send feedback about the tests to the LLM.
 *
 * The reply is printed only; the output file is left alone. Run `generate`
 * to rewrite it.
 *
 * Dependency direction: feedback.ts → commander, ora, workflow controller
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import ora from 'ora';
import { renderCompletion } from '../../core/workflow/controller.js';
import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function createFeedbackCommand(getContext: () => AppContext): Command {
    return new Command('feedback')
        .description('Send feedback about the generated tests to the LLM')
        .argument('<text...>', 'Feedback text (quote it, or pass several words)')
        .addHelpText('after', '\nExample:\n  $ api-test-agent feedback "Add a boundary test."')
        .action(async (words: string[]) => {
            const { controller } = getContext();

            const spinner = ora('Processing feedback with the LLM...').start();
            const result = await controller.feedback(words.join(' '));
            if (result.ok) {
                spinner.succeed('Feedback processed');
            } else {
                spinner.fail('Feedback failed');
            }

            console.log(renderCompletion(result));
            logger.header('End of Feedback Response');
        });
}
