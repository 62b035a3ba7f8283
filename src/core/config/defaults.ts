/**
 * Default configuration values.
 *
 * A project without a config file runs on these; `api-test-agent init`
 * writes them out so they can be edited.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init command
 */

import type { AppConfig } from './types.js';

export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    provider: {
        baseUrl: 'https://openrouter.ai/api/v1',
        model: 'openai/gpt-4o-mini',
        // Repeatable output across runs.
        temperature: 0,
        timeoutMs: 60_000,
        appTitle: 'LLM-based API Testing',
    },

    tester: {
        outputFile: 'generated_tests.py',
        command: 'pytest',
        args: ['-v'],
    },

    // Tool selection should be repeatable, so the agent runs cold.
    agent: {
        model: 'openai/gpt-4o-mini',
        temperature: 0,
        maxSteps: 5,
    },

    fixture: {
        host: '127.0.0.1',
        port: 8000,
    },

    logLevel: 'info',
};

/** The directory name where config is stored inside a project. */
export const CONFIG_DIR_NAME = '.api-test-agent';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';
