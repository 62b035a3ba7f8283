/**
 * Fixture API — the toy service the generated tests are written against.
 *
 * A pure routing table from (path, `param` query value, Authorization header)
 * to (status, body). The HTTP server in fixture/server.ts and the generation
 * prompt are both built from it, so the oracle lives in one place.
 *
 * Dependency direction: fixture/api.ts → nothing
 * Used by: fixture/server.ts, prompts/library.ts
 */

export const INVALID_API_KEY_HEADER = 'Bearer invalid-api-key';

export interface FixtureRequest {
    readonly path: string;
    /** Value of the `param` query parameter, if present. */
    readonly param?: string;
    /** Raw Authorization header, if present. */
    readonly authorization?: string;
}

export type FixtureBody = { readonly result: 'success' } | { readonly detail: string };

export interface FixtureResponse {
    readonly status: 200 | 401 | 403 | 404 | 500;
    readonly body: FixtureBody;
}

export const FIXTURE_ROUTES = ['/api/endpoint', '/api/nonexistent', '/api/error'] as const;

const SUCCESS: FixtureResponse = { status: 200, body: { result: 'success' } };

function endpoint(request: FixtureRequest): FixtureResponse {
    // Param matches are checked before any auth rule.
    if (request.param === 'max' || request.param === 'min') {
        return SUCCESS;
    }
    if (request.authorization === INVALID_API_KEY_HEADER) {
        return { status: 403, body: { detail: 'Forbidden' } };
    }
    if (request.authorization === undefined) {
        return { status: 401, body: { detail: 'Unauthorized' } };
    }
    return { status: 404, body: { detail: 'Not found' } };
}

export function handleFixtureRequest(request: FixtureRequest): FixtureResponse {
    switch (request.path) {
        case '/api/endpoint':
            return endpoint(request);
        case '/api/nonexistent':
            return { status: 404, body: { detail: 'Non-existent endpoint' } };
        case '/api/error':
            return { status: 500, body: { detail: 'Server error' } };
        default:
            return { status: 404, body: { detail: 'Not Found' } };
    }
}

/** One row of the behaviour table the generated tests must encode. */
export interface FixtureExpectation {
    /** Name the generated pytest function must use. */
    readonly testName: string;
    readonly description: string;
    readonly request: FixtureRequest;
}

/**
 * The required generated tests, each paired with the request it makes.
 * Expected responses come from handleFixtureRequest.
 */
export const FIXTURE_EXPECTATIONS: readonly FixtureExpectation[] = [
    {
        testName: 'test_endpoint_with_max',
        description: 'GET /api/endpoint?param=max',
        request: { path: '/api/endpoint', param: 'max' },
    },
    {
        testName: 'test_endpoint_with_min',
        description: 'GET /api/endpoint?param=min',
        request: { path: '/api/endpoint', param: 'min' },
    },
    {
        testName: 'test_endpoint_no_auth',
        description: 'GET /api/endpoint?param=random with no Authorization header',
        request: { path: '/api/endpoint', param: 'random' },
    },
    {
        testName: 'test_endpoint_invalid_api_key',
        description: `GET /api/endpoint?param=random with 'Authorization: ${INVALID_API_KEY_HEADER}'`,
        request: { path: '/api/endpoint', param: 'random', authorization: INVALID_API_KEY_HEADER },
    },
    {
        testName: 'test_endpoint_random_auth_key',
        description: "GET /api/endpoint?param=random with 'Authorization: Bearer valid-api-key'",
        request: { path: '/api/endpoint', param: 'random', authorization: 'Bearer valid-api-key' },
    },
    {
        testName: 'test_nonexistent_endpoint',
        description: 'GET /api/nonexistent',
        request: { path: '/api/nonexistent' },
    },
    {
        testName: 'test_error_endpoint',
        description: 'GET /api/error',
        request: { path: '/api/error' },
    },
];
