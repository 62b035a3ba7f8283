/**
 * Workflow controller — the plan / generate / run / feedback operations.
 *
 * Each operation returns a Result instead of printing or throwing, and has a
 * matching `render*` function producing the text the CLI prints and the agent
 * tools return. Failures from the taxonomy in core/errors.ts stop here.
 *
 * Dependency direction: controller.ts → providers/types, prompts, code-extractor,
 *                       test-runner, utils/fs, core/errors, core/result
 * Used by: CLI commands, reflection loop, agent tools
 */

import { resolve } from 'node:path';
import type { CompletionClient, CompletionResult } from '../../providers/types.js';
import type { TesterConfig } from '../config/types.js';
import { formatDiagnostic, WriteError, type CompletionError } from '../errors.js';
import { err, ok, type Result } from '../result.js';
import { buildFeedbackPrompt, buildGenerationPrompt, PLAN_PROMPT } from '../../prompts/library.js';
import { extractCode } from './code-extractor.js';
import { runTests, type RunTestsResult, type TestRunnerFn } from './test-runner.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface WorkflowControllerOptions {
    readonly client: CompletionClient;
    /** Directory the output file and the test process are relative to. */
    readonly projectRoot: string;
    readonly tester: TesterConfig;
    /** Passed to the test process as TEST_API_URL. */
    readonly testApiUrl: string;
    /** Defaults to the execa-backed runner. */
    readonly runTests?: TestRunnerFn;
}

export interface GeneratedFile {
    /** Output file as configured (relative to the project root). */
    readonly file: string;
    readonly code: string;
}

export type GenerateResult = Result<GeneratedFile, CompletionError | WriteError>;

export class WorkflowController {
    private readonly options: WorkflowControllerOptions;
    private readonly client: CompletionClient;
    private readonly runner: TestRunnerFn;

    constructor(options: WorkflowControllerOptions) {
        this.options = options;
        this.client = options.client;
        this.runner = options.runTests ?? runTests;
    }

    /** Output file as configured. */
    get outputFile(): string {
        return this.options.tester.outputFile;
    }

    /** Ask for a test plan. Writes nothing. */
    async plan(): Promise<CompletionResult> {
        logger.debug('Fetching a test plan from the LLM');
        return this.client.complete(PLAN_PROMPT);
    }

    /**
     * Ask for test code and overwrite the output file with it.
     * A failed completion leaves any previous file untouched.
     */
    async generate(): Promise<GenerateResult> {
        logger.debug('Requesting test code from the LLM');

        const response = await this.client.complete(buildGenerationPrompt());
        if (!response.ok) {
            logger.debug(`Generation aborted: ${response.error.code}`);
            return response;
        }

        const code = extractCode(response.value);
        const target = resolve(this.options.projectRoot, this.outputFile);

        try {
            writeTextFile(target, code);
        } catch (cause) {
            return err(cause instanceof WriteError ? cause : new WriteError(target, cause));
        }

        logger.debug(`Wrote ${code.length} chars to ${target}`);
        return ok({ file: this.outputFile, code });
    }

    /** Execute the output file with the configured test runner. */
    async run(): Promise<RunTestsResult> {
        logger.header(`Running the generated tests with ${this.options.tester.command}`);
        return this.runner(this.outputFile, {
            command: this.options.tester.command,
            args: this.options.tester.args,
            cwd: this.options.projectRoot,
            env: { TEST_API_URL: this.options.testApiUrl },
        });
    }

    /**
     * Send free-form feedback along with the file skeleton and return the
     * model's reply. The output file is not touched.
     */
    async feedback(text: string): Promise<CompletionResult> {
        logger.debug('Processing feedback with the LLM');
        return this.client.complete(buildFeedbackPrompt(text));
    }
}

// ── Rendering ──

/** Completion text verbatim, or the diagnostic. Used for plan and feedback. */
export function renderCompletion(result: CompletionResult): string {
    return result.ok ? result.value : formatDiagnostic(result.error);
}

export function renderGenerate(result: GenerateResult): string {
    if (result.ok) {
        return (
            `Successfully generated test code in '${result.value.file}'\n\n` +
            'You may now run the tests with: api-test-agent run'
        );
    }
    if (result.error instanceof WriteError) {
        return formatDiagnostic(result.error);
    }
    return `${formatDiagnostic(result.error)}\n\nGeneration aborted.`;
}

export function renderRun(result: RunTestsResult): string {
    if (!result.ok) {
        return formatDiagnostic(result.error);
    }
    const { status, exitCode, output } = result.value;
    const summary =
        status === 'passed'
            ? 'All tests passed successfully!'
            : `Some tests failed with exit code ${exitCode}. See above for details.`;
    return output ? `${output}\n\n${summary}` : summary;
}
