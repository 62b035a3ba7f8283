/**
 * Builds the Commander program. Kept apart from the bin entry so tests can
 * drive it with a fake context.
 *
 * Dependency direction: program.ts → commander, all command files
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import type { AppContext, ContextLoader } from './context.js';
import { loadContextOrExit } from './utils/context.js';
import { createPlanCommand } from './commands/plan.js';
import { createGenerateCommand } from './commands/generate.js';
import { createRunCommand } from './commands/run.js';
import { createFeedbackCommand } from './commands/feedback.js';
import { createSafeRunCommand } from './commands/safe-run.js';
import { createAgentCommand } from './commands/agent.js';
import { createServeCommand } from './commands/serve.js';
import { createInitCommand } from './commands/init.js';
import { createConfigCommand } from './commands/config.js';

export interface ProgramOptions {
    readonly loadContext: ContextLoader;
    readonly projectRoot: string;
}

/**
 * Lowercase the command operand when it names a known command, so `PLAN`
 * runs `plan`. Other arguments, and unknown commands, pass through as given.
 *
 * @param args - User arguments, without the node and script paths
 */
export function normalizeCommandArgs(program: Command, args: readonly string[]): string[] {
    const index = args.findIndex((arg) => !arg.startsWith('-'));
    const operand = index === -1 ? undefined : args[index];
    if (operand === undefined) return [...args];

    const name = operand.toLowerCase();
    const known = program.commands.some((command) => command.name() === name);
    if (!known) return [...args];

    const normalized = [...args];
    normalized[index] = name;
    return normalized;
}

export function createProgram(options: ProgramOptions): Command {
    const program = new Command();

    program
        .name('api-test-agent')
        .description('LLM-powered API testing — plan, generate, run and refine pytest suites')
        .version('0.1.0')
        .option('-v, --verbose', 'Show debug logging')
        .showHelpAfterError();

    const getContext = (): AppContext =>
        loadContextOrExit(() =>
            options.loadContext({ verbose: program.opts<{ verbose?: boolean }>().verbose === true }),
        );

    const commands = [
        createPlanCommand(getContext),
        createGenerateCommand(getContext),
        createRunCommand(getContext),
        createFeedbackCommand(getContext),
        createSafeRunCommand(getContext),
        createAgentCommand(getContext),
        createServeCommand(getContext),
        createInitCommand(() => options.projectRoot),
        createConfigCommand(getContext),
    ];

    for (const command of commands) {
        program.addCommand(command.showHelpAfterError());
    }

    return program;
}
