/**
 * Workflow operations exposed as agent tools.
 *
 * Tools call the controller in process and return the same text the CLI
 * would print, so the agent sees exactly what a user would.
 *
 * Dependency direction: tools.ts → workflow controller, reflection loop
 * Used by: agents/agent.ts, `agent` command
 */

import {
    renderCompletion,
    renderGenerate,
    renderRun,
    type WorkflowController,
} from '../core/workflow/controller.js';
import { reflectionOperations, runWithReflection } from '../core/workflow/reflection.js';
import type { AgentTool } from './types.js';

export function createWorkflowTools(controller: WorkflowController): AgentTool[] {
    return [
        {
            name: 'Plan',
            description: 'Generate a test plan for the API. Input is ignored.',
            call: async () => renderCompletion(await controller.plan()),
        },
        {
            name: 'Generate',
            description: `Generate or update the pytest test code for the API and write it to ${controller.outputFile}. Input is ignored.`,
            call: async () => renderGenerate(await controller.generate()),
        },
        {
            name: 'Run',
            description: `Run the test runner on ${controller.outputFile} and report the output. Input is ignored.`,
            call: async () => renderRun(await controller.run()),
        },
        {
            name: 'Feedback',
            description: 'Send user feedback about the tests to the LLM and return its suggested code. Input is the feedback text.',
            call: async (input) => {
                const text = input.trim();
                if (!text) return 'Feedback needs some text to send.';
                return renderCompletion(await controller.feedback(text));
            },
        },
        {
            name: 'SafeRun',
            description:
                'Run the tests with a single reflection pass if they fail. Stops after one attempt to fix. Input is ignored.',
            call: async () => (await runWithReflection(reflectionOperations(controller))).text,
        },
    ];
}
