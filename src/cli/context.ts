/**
 * Builds everything a command needs from the project directory and the
 * process environment: config, log level, completion client, controller.
 *
 * Dependency direction: context.ts → config, providers/openrouter, workflow controller
 * Used by: cli/index.ts
 */

import { loadConfig } from '../core/config/manager.js';
import { resolveEnvironment, type RuntimeEnvironment } from '../core/config/environment.js';
import type { AppConfig } from '../core/config/types.js';
import { WorkflowController } from '../core/workflow/controller.js';
import { OpenRouterClient } from '../providers/openrouter.js';
import type { CompletionClient } from '../providers/types.js';
import { LogLevel, parseLogLevel, setLogLevel } from '../utils/logger.js';

export interface AppContext {
    readonly projectRoot: string;
    readonly config: AppConfig;
    readonly environment: RuntimeEnvironment;
    readonly client: CompletionClient;
    readonly controller: WorkflowController;
}

export interface ContextOptions {
    /** Forces debug logging regardless of config and environment. */
    readonly verbose?: boolean;
}

/** How commands obtain their context; swapped for a fake in tests. */
export type ContextLoader = (options: ContextOptions) => AppContext;

/**
 * @throws {ConfigError} if the project's config file is invalid
 */
export function createAppContext(
    projectRoot: string,
    env: NodeJS.ProcessEnv,
    options: ContextOptions = {},
): AppContext {
    const config = loadConfig(projectRoot);
    const environment = resolveEnvironment(env);

    // --verbose beats the environment, which beats the config file.
    const level = options.verbose
        ? LogLevel.Debug
        : environment.logLevel ?? parseLogLevel(config.logLevel) ?? LogLevel.Info;
    setLogLevel(level);

    const client = new OpenRouterClient({ ...config.provider, apiKey: environment.apiKey });
    const controller = new WorkflowController({
        client,
        projectRoot,
        tester: config.tester,
        testApiUrl: environment.testApiUrl,
    });

    return { projectRoot, config, environment, client, controller };
}
