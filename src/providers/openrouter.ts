/**
 * OpenRouter completion client.
 *
 * Talks to the OpenAI-compatible Chat Completions API via fetch() — no SDK
 * dependency. One POST per call, no retries; every failure comes back as a
 * typed CompletionError inside the result.
 *
 * Dependency direction: openrouter.ts → providers/types.ts, core/errors.ts, zod
 * Used by: cli/context.ts
 */

import { z } from 'zod';
import {
    MalformedResponseError,
    MissingCredentialError,
    TransportError,
    UpstreamError,
} from '../core/errors.js';
import { API_KEY_VARIABLE } from '../core/config/environment.js';
import type { ProviderConfig } from '../core/config/types.js';
import { err, ok } from '../core/result.js';
import type { ChatMessage, CompletionClient, CompletionOptions, CompletionResult } from './types.js';
import { logger } from '../utils/logger.js';

export const SYSTEM_PROMPT =
    'You are an AI that generates or updates an API test plan or code ' +
    'based on user instructions. Reply with well-structured text or code. ' +
    'Do NOT include extra commentary outside code blocks.';

/** Configuration required to create an OpenRouter client. */
export interface OpenRouterClientConfig extends ProviderConfig {
    /** Absent when OPENROUTER_API_KEY is unset; every call then fails without touching the network. */
    readonly apiKey?: string;
    /** Swappable for tests. */
    readonly fetch?: typeof fetch;
}

const completionBodySchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string(),
                }),
            }),
        )
        .min(1),
});

const PREVIEW_LENGTH = 500;

export class OpenRouterClient implements CompletionClient {
    private readonly config: OpenRouterClientConfig;
    private readonly fetchImpl: typeof fetch;

    constructor(config: OpenRouterClientConfig) {
        this.config = config;
        this.fetchImpl = config.fetch ?? fetch;
    }

    async complete(prompt: string, options?: CompletionOptions): Promise<CompletionResult> {
        const apiKey = this.config.apiKey;
        if (!apiKey) {
            return err(new MissingCredentialError(API_KEY_VARIABLE));
        }

        const model = options?.model ?? this.config.model;
        const messages: ChatMessage[] = [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
        ];

        const body: Record<string, unknown> = {
            model,
            messages,
            stream: false,
            temperature: options?.temperature ?? this.config.temperature,
        };
        if (options?.stopSequences?.length) {
            body.stop = options.stopSequences;
        }

        const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
        logger.debug(`Completion request: model=${model}, prompt=${prompt.length} chars`);

        let response: Response;
        try {
            response = await this.fetchImpl(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${apiKey}`,
                    'X-Title': this.config.appTitle,
                },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
        } catch (cause) {
            const timedOut = cause instanceof Error && cause.name === 'TimeoutError';
            const reason = timedOut
                ? `timed out after ${this.config.timeoutMs / 1000}s`
                : cause instanceof Error
                  ? cause.message
                  : String(cause);
            return err(new TransportError(`Request to completion service failed: ${reason}`, cause, { url }));
        }

        let text: string;
        try {
            text = await response.text();
        } catch (cause) {
            return err(
                new TransportError(
                    `Reading the completion response failed: ${cause instanceof Error ? cause.message : String(cause)}`,
                    cause,
                    { url },
                ),
            );
        }

        if (response.status !== 200) {
            return err(new UpstreamError(response.status, text));
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch {
            return err(new MalformedResponseError('Response body is not JSON', text.slice(0, PREVIEW_LENGTH)));
        }

        const parsed = completionBodySchema.safeParse(json);
        if (!parsed.success) {
            return err(
                new MalformedResponseError('No usable choices returned by the LLM', text.slice(0, PREVIEW_LENGTH)),
            );
        }

        const [first] = parsed.data.choices;
        return ok(first ? first.message.content.trim() : '');
    }
}
