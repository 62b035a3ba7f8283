/**
 * Prompt library — every prompt the workflow sends.
 *
 * All builders are pure; user text is inserted verbatim. A feedback string
 * that itself contains ``` can shift where the extractor finds the code
 * block in the reply. That is accepted, not escaped.
 *
 * Dependency direction: library.ts → fixture/api, config/environment
 * Used by: workflow controller, reflection loop
 */

import { DEFAULT_TEST_API_URL } from '../core/config/environment.js';
import { FIXTURE_EXPECTATIONS, handleFixtureRequest, type FixtureResponse } from '../fixture/api.js';

/** Skeleton of the generated pytest file; the model fills in {test_functions}. */
export const TEST_FILE_SKELETON = `import os
import requests
import pytest

BASE_URL = os.getenv('TEST_API_URL', '${DEFAULT_TEST_API_URL}')

{test_functions}`;

export const PLAN_PROMPT =
    'Generate a test plan for a fictional REST API with categories like ' +
    'authorization, boundary, and error handling. Include a few scenarios each.';

function describeResponse(response: FixtureResponse): string {
    return 'result' in response.body
        ? `${response.status}, JSON ${JSON.stringify(response.body)}`
        : String(response.status);
}

/** Numbered behaviour table, one line per required test. */
export function formatExpectations(): string {
    return FIXTURE_EXPECTATIONS.map((expectation, index) => {
        const response = handleFixtureRequest(expectation.request);
        return `${index + 1}) ${expectation.testName}: ${expectation.description} => ${describeResponse(response)}`;
    }).join('\n');
}

export function buildGenerationPrompt(): string {
    return `Below is a skeleton of our test file using pytest. Fill in the 'test_functions'
placeholder with tests for the following real API behavior:

${formatExpectations()}

For /api/endpoint the 'param' checks come first: 'max' and 'min' always succeed.
For any other value, 'Bearer invalid-api-key' => 403, no Authorization header => 401,
any other Authorization header => 404.

We want exactly these test functions:
${FIXTURE_EXPECTATIONS.map((e) => `- ${e.testName}`).join('\n')}

Skeleton:
\`\`\`python
${TEST_FILE_SKELETON}
\`\`\`

Requirements:
1. Use the '/api/' prefix for all routes.
2. Only return valid Python code, wrapped in triple backticks (no extra commentary).
3. Keep 'BASE_URL' from the TEST_API_URL env variable or default ${DEFAULT_TEST_API_URL}.
4. Provide all tests in place of {test_functions}.
5. Each test asserts the correct status code (and JSON if needed).
6. The final output should be a complete Python file that can run under pytest.`;
}

export function buildFeedbackPrompt(feedback: string): string {
    return `We have the above logic for '/api/endpoint', '/api/nonexistent', and '/api/error'.
User feedback: '${feedback}'

Please update or expand the test code using the same approach.
The skeleton is:
\`\`\`python
${TEST_FILE_SKELETON}
\`\`\`
Insert your changes in {test_functions}, produce valid Python code in triple backticks.`;
}

/** Feedback text the reflection loop sends after a failed first run. */
export function buildReflectionFeedback(runOutput: string): string {
    return (
        'Some tests failed. Here is the run output:\n\n' +
        `${runOutput}\n\n` +
        'Please fix these failures and regenerate the tests accordingly.'
    );
}
