/**
 * Loads the command context, turning a bad config file into an error
 * message and exit code 1 instead of a stack trace.
 *
 * Dependency direction: utils/context.ts → cli/context, utils/logger
 * Used by: every command that talks to the workflow
 */

import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function loadContextOrExit(load: () => AppContext): AppContext {
    try {
        return load();
    } catch (err) {
        logger.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
    }
}
