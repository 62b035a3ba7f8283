/**
 * Agent type definitions.
 *
 * Dependency direction: agents/types.ts → nothing (leaf module)
 * Used by: agents/agent.ts, agents/tools.ts
 */

/** Something the agent can call by name with a single text input. */
export interface AgentTool {
    readonly name: string;
    /** Shown to the model; says what the tool does and what its input means. */
    readonly description: string;
    call(input: string): Promise<string>;
}

/** What one model reply asks for. */
export type AgentDecision =
    | { readonly type: 'action'; readonly tool: string; readonly input: string }
    | { readonly type: 'final'; readonly answer: string };

/** A tool call the agent made and what it saw. */
export interface AgentStep {
    readonly tool: string;
    readonly input: string;
    readonly observation: string;
}

export interface AgentTurn {
    readonly answer: string;
    readonly steps: readonly AgentStep[];
}
