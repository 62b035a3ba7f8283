/**
 * `api-test-agent generate` — Generate test code and write it to the output file.
 *
 * Failures are printed; the exit code stays 0.
 *
 * Dependency direction: generate.ts → commander, ora, workflow controller
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import ora from 'ora';
import { renderGenerate } from '../../core/workflow/controller.js';
import type { AppContext } from '../context.js';

export function createGenerateCommand(getContext: () => AppContext): Command {
    return new Command('generate')
        .description('Generate pytest code for the API and write it to the output file')
        .action(async () => {
            const { controller } = getContext();

            const spinner = ora('Requesting test code from the LLM...').start();
            const result = await controller.generate();
            if (result.ok) {
                spinner.succeed(`Test code written to ${result.value.file}`);
            } else {
                spinner.fail('Generation failed');
            }

            console.log(renderGenerate(result));
        });
}
