#!/usr/bin/env node

/**
 * CLI entry point.
 *
 * Dependency direction: cli/index.ts → cli/program, cli/context
 * Used by: package.json bin entry ("api-test-agent" binary)
 */

import { createProgram, normalizeCommandArgs } from './program.js';
import { createAppContext } from './context.js';

const projectRoot = process.cwd();

const program = createProgram({
    projectRoot,
    loadContext: (options) => createAppContext(projectRoot, process.env, options),
});

await program.parseAsync(normalizeCommandArgs(program, process.argv.slice(2)), { from: 'user' });
