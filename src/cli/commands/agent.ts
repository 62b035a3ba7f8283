/**
 * `api-test-agent agent` — Chat with an agent that can plan, generate, run
 * and fix the tests through the workflow tools.
 *
 * Dependency direction: agent.ts → commander, prompts, chalk, agents
 * Used by: cli/program.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import prompts from 'prompts';
import { ConversationalAgent } from '../../agents/agent.js';
import { createWorkflowTools } from '../../agents/tools.js';
import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

const EXIT_WORDS = new Set(['quit', 'exit']);

export function createAgentCommand(getContext: () => AppContext): Command {
    return new Command('agent')
        .description('Start an interactive testing agent')
        .action(async () => {
            const { config, client, controller } = getContext();
            const agent = new ConversationalAgent({
                client,
                tools: createWorkflowTools(controller),
                model: config.agent.model,
                temperature: config.agent.temperature,
                maxSteps: config.agent.maxSteps,
            });

            logger.header('AI Testing Agent');
            console.log(chalk.gray('Type "quit" or "exit" to stop.'));

            for (;;) {
                const answer = await prompts({ type: 'text', name: 'message', message: 'User' });
                const message: unknown = answer.message;

                // Ctrl+C leaves the answer empty.
                if (typeof message !== 'string' || EXIT_WORDS.has(message.trim().toLowerCase())) {
                    break;
                }
                if (!message.trim()) continue;

                const turn = await agent.respond(message);
                console.log(`\n${chalk.bold('Agent:')} ${turn.answer}`);
            }
        });
}
