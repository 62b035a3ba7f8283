/**
 * Tests for the OpenRouter completion client. fetch is replaced with a mock.
 */

import { describe, it, expect, vi } from 'vitest';
import { OpenRouterClient, SYSTEM_PROMPT } from '../../src/providers/openrouter.js';
import { DEFAULT_CONFIG } from '../../src/core/config/defaults.js';
import {
    MalformedResponseError,
    MissingCredentialError,
    TransportError,
    UpstreamError,
} from '../../src/core/errors.js';

function createClient(fetchMock: typeof fetch): OpenRouterClient {
    return new OpenRouterClient({ ...DEFAULT_CONFIG.provider, apiKey: 'test-key', fetch: fetchMock });
}

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function completionBody(content: string): unknown {
    return { choices: [{ message: { role: 'assistant', content } }] };
}

describe('OpenRouterClient', () => {
    it('fails with MissingCredentialError without touching the network', async () => {
        const fetchMock = vi.fn<typeof fetch>();
        const client = new OpenRouterClient({ ...DEFAULT_CONFIG.provider, fetch: fetchMock });

        const result = await client.complete('hello');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(MissingCredentialError);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('posts the prompt and returns the trimmed content', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(completionBody('  a plan  \n')));

        const result = await createClient(fetchMock).complete('Generate a plan');

        expect(result).toEqual({ ok: true, value: 'a plan' });
        expect(fetchMock).toHaveBeenCalledTimes(1);

        const [url, init] = fetchMock.mock.calls[0] ?? [];
        expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
        expect(init?.method).toBe('POST');

        const headers = new Headers(init?.headers);
        expect(headers.get('Authorization')).toBe('Bearer test-key');
        expect(headers.get('Content-Type')).toBe('application/json');
        expect(headers.get('X-Title')).toBe('LLM-based API Testing');

        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'openai/gpt-4o-mini',
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: 'Generate a plan' },
            ],
            stream: false,
            temperature: 0,
        });
    });

    it('applies per-call model, temperature and stop sequences', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(completionBody('ok')));

        await createClient(fetchMock).complete('q', {
            model: 'anthropic/claude-3.5-sonnet',
            temperature: 0.5,
            stopSequences: ['\nObservation:'],
        });

        const [, init] = fetchMock.mock.calls[0] ?? [];
        expect(JSON.parse(String(init?.body))).toMatchObject({
            model: 'anthropic/claude-3.5-sonnet',
            temperature: 0.5,
            stop: ['\nObservation:'],
        });
    });

    it('maps a non-200 status to UpstreamError with the raw body', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('rate limited', { status: 429 }));

        const result = await createClient(fetchMock).complete('q');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(UpstreamError);
        expect(result.error.message).toBe('Completion service responded with status 429:\nrate limited');
    });

    it('maps a body without choices to MalformedResponseError', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ choices: [] }));

        const result = await createClient(fetchMock).complete('q');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(MalformedResponseError);
        expect(result.error.message).toBe('No usable choices returned by the LLM. Response content:\n{"choices":[]}');
    });

    it('maps a non-JSON 200 body to MalformedResponseError', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('<html>oops</html>', { status: 200 }));

        const result = await createClient(fetchMock).complete('q');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(MalformedResponseError);
    });

    it('maps a null content field to MalformedResponseError', async () => {
        const fetchMock = vi
            .fn<typeof fetch>()
            .mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));

        const result = await createClient(fetchMock).complete('q');

        expect(result.ok).toBe(false);
    });

    it('maps a network failure to TransportError', async () => {
        const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

        const result = await createClient(fetchMock).complete('q');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error.message).toBe('Request to completion service failed: fetch failed');
    });

    it('reports a timeout in seconds', async () => {
        const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
        const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(timeout);

        const result = await createClient(fetchMock).complete('q');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe('Request to completion service failed: timed out after 60s');
    });
});
