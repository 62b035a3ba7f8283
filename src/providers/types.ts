/**
 * Completion client contract.
 *
 * The workflow and the agent depend only on this interface, so tests can
 * hand them a fake and the real client can point at any OpenAI-compatible
 * chat completions endpoint.
 *
 * Dependency direction: providers/types.ts → core/result, core/errors
 * Used by: providers/openrouter.ts, workflow controller, agent
 */

import type { CompletionError } from '../core/errors.js';
import type { Result } from '../core/result.js';

/** Role in a chat conversation. */
export type ChatRole = 'system' | 'user' | 'assistant';

/** A single message in a chat conversation. */
export interface ChatMessage {
    readonly role: ChatRole;
    readonly content: string;
}

/** Per-call overrides; anything left out falls back to the client's config. */
export interface CompletionOptions {
    /** Model to use (overrides default from config). */
    readonly model?: string;
    /** Sampling temperature (0.0 - 2.0). */
    readonly temperature?: number;
    /** Stop sequences to halt generation. */
    readonly stopSequences?: readonly string[];
}

/** Trimmed completion text, or the reason there is none. */
export type CompletionResult = Result<string, CompletionError>;

export interface CompletionClient {
    /**
     * Send one prompt and return the response text.
     * Never throws for service-side problems; those come back as a failed result.
     */
    complete(prompt: string, options?: CompletionOptions): Promise<CompletionResult>;
}
