/**
 * Bounded self-correction loop.
 *
 *   start → first_run ──passed──────────────────────────────→ end
 *                     └─failed→ feedback_and_regenerate → second_run → end
 *
 * At most two runs per invocation, whatever the second round's feedback and
 * generate calls return. Classification is a case-insensitive search for
 * "failed" in the rendered run text.
 *
 * Dependency direction: reflection.ts → prompts/library, workflow controller
 * Used by: `safe-run` command, agent tools
 */

import { buildReflectionFeedback } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';
import {
    renderCompletion,
    renderGenerate,
    renderRun,
    type WorkflowController,
} from './controller.js';

export const ReflectionState = {
    Start: 'start',
    FirstRun: 'first_run',
    FeedbackAndRegenerate: 'feedback_and_regenerate',
    SecondRun: 'second_run',
    End: 'end',
} as const;

export type ReflectionState = (typeof ReflectionState)[keyof typeof ReflectionState];

export const MAX_RUNS = 2;

/** The three steps the loop drives, as text in and text out. */
export interface ReflectionOperations {
    run(): Promise<string>;
    feedback(text: string): Promise<string>;
    generate(): Promise<string>;
}

export interface ReflectionReport {
    readonly passed: boolean;
    readonly runs: 1 | 2;
    /** States visited, in order, ending with `end`. */
    readonly states: readonly ReflectionState[];
    readonly text: string;
}

export function hasFailures(runOutput: string): boolean {
    return runOutput.toLowerCase().includes('failed');
}

export interface FailedAttempt {
    readonly firstRun: string;
    readonly feedback: string;
    readonly regeneration: string;
    readonly secondRun: string;
}

/** Report for a loop whose second run still failed. Order is fixed. */
export function formatFailedReport(attempt: FailedAttempt): string {
    return (
        'Tests still failed after one reflection attempt.\n\n' +
        `First run output:\n${attempt.firstRun}\n\n` +
        `Feedback response:\n${attempt.feedback}\n\n` +
        `Regeneration output:\n${attempt.regeneration}\n\n` +
        `Second run output:\n${attempt.secondRun}`
    );
}

export async function runWithReflection(ops: ReflectionOperations): Promise<ReflectionReport> {
    const states: ReflectionState[] = [ReflectionState.Start, ReflectionState.FirstRun];

    logger.step(1, MAX_RUNS, 'First attempt');
    const firstRun = await ops.run();

    if (!hasFailures(firstRun)) {
        states.push(ReflectionState.End);
        return {
            passed: true,
            runs: 1,
            states,
            text: `All tests passed on first attempt.\n\n${firstRun}`,
        };
    }

    states.push(ReflectionState.FeedbackAndRegenerate);
    logger.warn('Tests failed, attempting a single reflection');
    const feedback = await ops.feedback(buildReflectionFeedback(firstRun));
    const regeneration = await ops.generate();

    states.push(ReflectionState.SecondRun);
    logger.step(2, MAX_RUNS, 'Second attempt after regeneration');
    const secondRun = await ops.run();
    states.push(ReflectionState.End);

    if (!hasFailures(secondRun)) {
        return {
            passed: true,
            runs: 2,
            states,
            text: `Tests passed on second attempt after reflection.\n\n${secondRun}`,
        };
    }

    return {
        passed: false,
        runs: 2,
        states,
        text: formatFailedReport({ firstRun, feedback, regeneration, secondRun }),
    };
}

/** Bind the loop's steps to a controller, rendering each result as text. */
export function reflectionOperations(controller: WorkflowController): ReflectionOperations {
    return {
        run: async () => renderRun(await controller.run()),
        feedback: async (text) => renderCompletion(await controller.feedback(text)),
        generate: async () => renderGenerate(await controller.generate()),
    };
}
