/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod
 * Used by: manager.ts, types.ts, environment.ts
 */

import { z } from 'zod';

/**
 * Schema for the completion service (OpenRouter or any OpenAI-compatible endpoint).
 */
export const providerConfigSchema = z.object({
    /** Base URL; `/chat/completions` is appended. */
    baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
    /** Model identifier sent with every request. */
    model: z.string().min(1).default('openai/gpt-4o-mini'),
    /** Sampling temperature (0.0 = deterministic, higher = more creative). */
    temperature: z.number().min(0).max(2).default(0),
    /** Request timeout in milliseconds. */
    timeoutMs: z.number().int().min(1000).max(600_000).default(60_000),
    /** Sent as the X-Title header so requests are attributed in the provider dashboard. */
    appTitle: z.string().default('LLM-based API Testing'),
});

/**
 * Schema for the generated test file and the runner that executes it.
 */
export const testerConfigSchema = z.object({
    /** Where generated test code is written, relative to the project root. */
    outputFile: z.string().min(1).default('generated_tests.py'),
    /** Test runner executable. */
    command: z.string().min(1).default('pytest'),
    /** Extra arguments placed after the target file. */
    args: z.array(z.string()).default(['-v']),
});

/**
 * Schema for the conversational agent.
 */
export const agentConfigSchema = z.object({
    model: z.string().min(1).default('openai/gpt-4o-mini'),
    temperature: z.number().min(0).max(2).default(0),
    /** Upper bound on tool calls per user message. */
    maxSteps: z.number().int().min(1).max(20).default(5),
});

/**
 * Schema for the local fixture API server.
 */
export const fixtureConfigSchema = z.object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(0).max(65_535).default(8000),
});

/**
 * The complete application configuration schema.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    provider: providerConfigSchema.default({}),
    tester: testerConfigSchema.default({}),
    agent: agentConfigSchema.default({}),
    fixture: fixtureConfigSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});
