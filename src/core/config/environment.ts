/**
 * Process environment, read once at startup and handed to the pieces that
 * need it. Nothing below the CLI reads `process.env` on its own.
 *
 * Dependency direction: environment.ts → utils/logger
 * Used by: CLI bootstrap (cli/context.ts)
 */

import { parseLogLevel, type LogLevel } from '../../utils/logger.js';

export const API_KEY_VARIABLE = 'OPENROUTER_API_KEY';
export const TEST_API_URL_VARIABLE = 'TEST_API_URL';
export const LOG_LEVEL_VARIABLE = 'API_TEST_AGENT_LOG_LEVEL';

export const DEFAULT_TEST_API_URL = 'http://localhost:8000';

export interface RuntimeEnvironment {
    /** Completion service key; undefined when unset or blank. */
    readonly apiKey?: string;
    /** Base URL the generated tests call. */
    readonly testApiUrl: string;
    /** Log level override, if one was given. */
    readonly logLevel?: LogLevel;
}

export function resolveEnvironment(env: NodeJS.ProcessEnv): RuntimeEnvironment {
    const apiKey = env[API_KEY_VARIABLE]?.trim();
    const testApiUrl = env[TEST_API_URL_VARIABLE]?.trim();

    return {
        apiKey: apiKey ? apiKey : undefined,
        testApiUrl: testApiUrl ? testApiUrl : DEFAULT_TEST_API_URL,
        logLevel: parseLogLevel(env[LOG_LEVEL_VARIABLE]),
    };
}
