/**
 * Test runner — executes the generated test file and captures results.
 *
 * Runs `<command> <target> <args...>` (by default `pytest generated_tests.py -v`)
 * and waits for it to exit; there is no timeout, so a hung test process hangs
 * the caller. A run ended by a signal counts as failed.
 *
 * Dependency direction: test-runner.ts → execa, core/errors, core/result, utils
 * Used by: workflow controller
 */

import { constants } from 'node:os';
import { execa } from 'execa';
import { ProcessSpawnError } from '../errors.js';
import { err, ok, type Result } from '../result.js';
import { logger } from '../../utils/logger.js';

export type RunStatus = 'passed' | 'failed';

export interface RunOutcome {
    /** `passed` exactly when the exit code is 0. */
    readonly status: RunStatus;
    readonly exitCode: number;
    /** Interleaved stdout + stderr. */
    readonly output: string;
}

export interface TestRunnerOptions {
    /** Test runner executable (e.g. `pytest`). */
    readonly command: string;
    /** Arguments placed after the target file. */
    readonly args: readonly string[];
    /** Working directory for the process. */
    readonly cwd: string;
    /** Extra environment variables, merged over the current process environment. */
    readonly env?: Readonly<Record<string, string>>;
}

export type RunTestsResult = Result<RunOutcome, ProcessSpawnError>;

/** Signature the workflow controller depends on, so tests can swap it. */
export type TestRunnerFn = (targetPath: string, options: TestRunnerOptions) => Promise<RunTestsResult>;

export function classifyExitCode(exitCode: number): RunStatus {
    return exitCode === 0 ? 'passed' : 'failed';
}

/**
 * Run the test runner against one file.
 *
 * @param targetPath - File handed to the runner as its first argument
 */
export async function runTests(targetPath: string, options: TestRunnerOptions): Promise<RunTestsResult> {
    const commandLine = [options.command, targetPath, ...options.args].join(' ');
    logger.info(`Running tests: ${commandLine}`);

    const result = await execa(options.command, [targetPath, ...options.args], {
        cwd: options.cwd,
        all: true,
        reject: false, // Don't throw on non-zero exit
        env: { ...process.env, ...options.env, FORCE_COLOR: '0' }, // Disable color for cleaner output
    });

    if (result.signal !== undefined) {
        // Shell convention for a process ended by a signal.
        const exitCode = 128 + (constants.signals[result.signal] ?? 0);
        logger.warn(`Tests terminated by ${result.signal}`);
        return ok({ status: 'failed', exitCode, output: result.all ?? '' });
    }

    if (result.exitCode === undefined) {
        const reason = result instanceof Error ? result.message : 'process exited without a status';
        logger.error(`Failed to run tests: ${reason}`);
        return err(new ProcessSpawnError(options.command, reason));
    }

    const status = classifyExitCode(result.exitCode);
    if (status === 'passed') {
        logger.success('Tests passed');
    } else {
        logger.warn(`Tests failed (exit code: ${result.exitCode})`);
    }

    return ok({ status, exitCode: result.exitCode, output: result.all ?? '' });
}
