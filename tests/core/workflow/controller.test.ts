/**
 * Tests for the workflow controller and its renderers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
    WorkflowController,
    renderCompletion,
    renderGenerate,
    renderRun,
} from '../../../src/core/workflow/controller.js';
import {
    MissingCredentialError,
    ProcessSpawnError,
    UpstreamError,
    WriteError,
} from '../../../src/core/errors.js';
import { err, ok } from '../../../src/core/result.js';
import { PLAN_PROMPT } from '../../../src/prompts/library.js';
import {
    FakeCompletionClient,
    TEST_TESTER_CONFIG,
    failedRun,
    makeTempDir,
    passedRun,
    scriptedRunner,
} from '../../helpers/fakes.js';

const FENCE = '```';

let testDir: string;

function createController(client: FakeCompletionClient, runner = scriptedRunner()): WorkflowController {
    return new WorkflowController({
        client,
        projectRoot: testDir,
        tester: TEST_TESTER_CONFIG,
        testApiUrl: 'http://localhost:8000',
        runTests: runner,
    });
}

function outputPath(): string {
    return join(testDir, 'generated_tests.py');
}

beforeEach(() => {
    testDir = makeTempDir('controller');
});

afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
});

describe('plan', () => {
    it('sends the plan prompt and returns the text without writing files', async () => {
        const client = new FakeCompletionClient(ok('1. Authorization tests'));
        const result = await createController(client).plan();

        expect(result).toEqual({ ok: true, value: '1. Authorization tests' });
        expect(client.calls[0]?.prompt).toBe(PLAN_PROMPT);
        expect(existsSync(outputPath())).toBe(false);
    });

    it('renders a failure as its diagnostic', async () => {
        const client = new FakeCompletionClient(err(new MissingCredentialError('OPENROUTER_API_KEY')));
        const result = await createController(client).plan();

        expect(renderCompletion(result)).toBe(
            'ERROR: The environment variable OPENROUTER_API_KEY is not set.\n' +
                'Please export OPENROUTER_API_KEY=<your_key> and try again.',
        );
    });
});

describe('generate', () => {
    it('writes the extracted code to the output file', async () => {
        const client = new FakeCompletionClient(
            ok(`Here:\n${FENCE}python\nimport os\n\ndef test_error_endpoint():\n    pass\n${FENCE}`),
        );
        const result = await createController(client).generate();

        expect(result).toEqual({
            ok: true,
            value: { file: 'generated_tests.py', code: 'import os\n\ndef test_error_endpoint():\n    pass' },
        });
        expect(readFileSync(outputPath(), 'utf-8')).toBe('import os\n\ndef test_error_endpoint():\n    pass');
        expect(client.calls[0]?.prompt).toContain('- test_endpoint_with_max');
    });

    it('overwrites the file on a second call', async () => {
        const client = new FakeCompletionClient(ok('first_version = 1'), ok(`${FENCE}\nsecond_version = 2\n${FENCE}`));
        const controller = createController(client);

        await controller.generate();
        await controller.generate();

        expect(readFileSync(outputPath(), 'utf-8')).toBe('second_version = 2');
    });

    it('leaves an existing file untouched when the completion fails', async () => {
        writeFileSync(outputPath(), 'previous = True', 'utf-8');
        const client = new FakeCompletionClient(err(new UpstreamError(502, 'bad gateway')));

        const result = await createController(client).generate();

        expect(result.ok).toBe(false);
        expect(readFileSync(outputPath(), 'utf-8')).toBe('previous = True');
        expect(renderGenerate(result)).toBe(
            'ERROR: Completion service responded with status 502:\nbad gateway\n\nGeneration aborted.',
        );
    });

    it('returns WriteError when the file cannot be written', async () => {
        const client = new FakeCompletionClient(ok('x = 1'));
        const controller = new WorkflowController({
            client,
            projectRoot: join(testDir, 'missing-dir'),
            tester: TEST_TESTER_CONFIG,
            testApiUrl: 'http://localhost:8000',
        });

        const result = await controller.generate();

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(WriteError);
        expect(renderGenerate(result)).toMatch(/^ERROR: Could not write to .*generated_tests\.py: /);
    });

    it('renders success with the file name', () => {
        expect(renderGenerate(ok({ file: 'generated_tests.py', code: 'x = 1' }))).toBe(
            "Successfully generated test code in 'generated_tests.py'\n\n" +
                'You may now run the tests with: api-test-agent run',
        );
    });
});

describe('run', () => {
    it('hands the output file and tester settings to the runner', async () => {
        const runner = vi.fn(async () => passedRun('7 passed'));
        const controller = new WorkflowController({
            client: new FakeCompletionClient(),
            projectRoot: testDir,
            tester: TEST_TESTER_CONFIG,
            testApiUrl: 'http://127.0.0.1:9000',
            runTests: runner,
        });

        const result = await controller.run();

        expect(result).toEqual(passedRun('7 passed'));
        expect(runner).toHaveBeenCalledWith('generated_tests.py', {
            command: 'pytest',
            args: ['-v'],
            cwd: testDir,
            env: { TEST_API_URL: 'http://127.0.0.1:9000' },
        });
    });

    it('renders passed and failed outcomes with a summary line', () => {
        expect(renderRun(passedRun('7 passed'))).toBe('7 passed\n\nAll tests passed successfully!');
        expect(renderRun(failedRun('1 failed, 6 passed', 1))).toBe(
            '1 failed, 6 passed\n\nSome tests failed with exit code 1. See above for details.',
        );
    });

    it('renders a spawn failure as a diagnostic', () => {
        expect(renderRun(err(new ProcessSpawnError('pytest', 'spawn pytest ENOENT')))).toBe(
            'ERROR: Test runner "pytest" failed to start: spawn pytest ENOENT',
        );
    });
});

describe('feedback', () => {
    it('embeds the feedback verbatim and does not write the file', async () => {
        const client = new FakeCompletionClient(ok(`${FENCE}python\nupdated = 1\n${FENCE}`));

        const result = await createController(client).feedback('Add a boundary test.');

        expect(renderCompletion(result)).toBe(`${FENCE}python\nupdated = 1\n${FENCE}`);
        expect(client.calls[0]?.prompt).toContain("User feedback: 'Add a boundary test.'");
        expect(existsSync(outputPath())).toBe(false);
    });
});
