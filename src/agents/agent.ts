/**
 * Conversational agent — a ReAct-style loop over the workflow tools.
 *
 * Each turn builds one prompt holding the tool list, the request and the
 * Thought / Action / Observation transcript so far, and asks the model for
 * the next step. The turn ends on a final answer, a completion failure, or
 * after `maxSteps` tool calls.
 *
 * Dependency direction: agent.ts → providers/types, agents/types, core/errors
 * Used by: `agent` command
 */

import type { CompletionClient } from '../providers/types.js';
import { formatDiagnostic } from '../core/errors.js';
import type { AgentDecision, AgentStep, AgentTool, AgentTurn } from './types.js';
import { logger } from '../utils/logger.js';

export interface ConversationalAgentOptions {
    readonly client: CompletionClient;
    readonly tools: readonly AgentTool[];
    readonly model: string;
    readonly temperature: number;
    readonly maxSteps: number;
}

const OBSERVATION_STOP = '\nObservation:';

/**
 * Read the model's next step from its reply.
 *
 * An action wins when it appears before any final answer; a reply with
 * neither is taken as the final answer.
 */
export function parseAgentReply(reply: string): AgentDecision {
    const finalIndex = reply.search(/Final Answer:/);
    const action = /Action:\s*(.+?)\s*\n\s*Action Input:\s*([\s\S]*)/.exec(reply);

    if (action && (finalIndex === -1 || action.index < finalIndex)) {
        let input = action[2] ?? '';
        const observationAt = input.indexOf('Observation:');
        if (observationAt !== -1) input = input.slice(0, observationAt);
        return {
            type: 'action',
            tool: (action[1] ?? '').trim(),
            input: input.trim().replace(/^"(.*)"$/s, '$1'),
        };
    }

    if (finalIndex !== -1) {
        return { type: 'final', answer: reply.slice(finalIndex + 'Final Answer:'.length).trim() };
    }

    return { type: 'final', answer: reply.trim() };
}

export class ConversationalAgent {
    private readonly options: ConversationalAgentOptions;
    private readonly toolsByName: Map<string, AgentTool>;

    constructor(options: ConversationalAgentOptions) {
        this.options = options;
        this.toolsByName = new Map(options.tools.map((tool) => [tool.name.toLowerCase(), tool]));
    }

    buildPrompt(request: string, scratchpad: string): string {
        const toolLines = this.options.tools.map((t) => `${t.name}: ${t.description}`).join('\n');
        const toolNames = this.options.tools.map((t) => t.name).join(', ');

        return `Answer the following request as best you can. You have access to the following tools:

${toolLines}

Use the following format:

Question: the input request you must answer
Thought: you should always think about what to do
Action: the action to take, should be one of [${toolNames}]
Action Input: the input to the action
Observation: the result of the action
... (this Thought/Action/Action Input/Observation can repeat N times)
Thought: I now know the final answer
Final Answer: the final answer to the original request

Begin!

Question: ${request}
Thought:${scratchpad}`;
    }

    async respond(request: string): Promise<AgentTurn> {
        const steps: AgentStep[] = [];
        let scratchpad = '';

        while (steps.length < this.options.maxSteps) {
            const reply = await this.options.client.complete(this.buildPrompt(request, scratchpad), {
                model: this.options.model,
                temperature: this.options.temperature,
                stopSequences: [OBSERVATION_STOP],
            });

            if (!reply.ok) {
                return { answer: formatDiagnostic(reply.error), steps };
            }

            const decision = parseAgentReply(reply.value);
            if (decision.type === 'final') {
                return { answer: decision.answer, steps };
            }

            const observation = await this.callTool(decision.tool, decision.input);
            steps.push({ tool: decision.tool, input: decision.input, observation });

            const thought = reply.value.split(OBSERVATION_STOP)[0] ?? reply.value;
            scratchpad += ` ${thought.trim()}\nObservation: ${observation}\nThought:`;
        }

        logger.warn(`Agent stopped after ${this.options.maxSteps} tool calls`);
        return {
            answer: `Agent stopped after ${this.options.maxSteps} tool calls without a final answer.`,
            steps,
        };
    }

    private async callTool(name: string, input: string): Promise<string> {
        const tool = this.toolsByName.get(name.toLowerCase());
        if (!tool) {
            const valid = this.options.tools.map((t) => t.name).join(', ');
            return `${name} is not a valid tool, try one of [${valid}].`;
        }

        logger.info(`Agent calling ${tool.name}`);
        return tool.call(input);
    }
}
