/**
 * Fixture API over HTTP, so generated tests have a live target.
 *
 * Dependency direction: fixture/server.ts → fastify, fixture/api.ts
 * Used by: `serve` command
 */

import fastify, { type FastifyInstance } from 'fastify';
import { FIXTURE_ROUTES, handleFixtureRequest } from './api.js';

export interface FixtureAppOptions {
    /** Enables fastify's request logging. */
    readonly logRequests?: boolean;
}

interface FixtureQuery {
    param?: string | string[];
}

export function buildFixtureApp(options: FixtureAppOptions = {}): FastifyInstance {
    const app = fastify({ logger: options.logRequests ?? false });

    for (const route of FIXTURE_ROUTES) {
        app.get<{ Querystring: FixtureQuery }>(route, async (request, reply) => {
            const { param } = request.query;
            const response = handleFixtureRequest({
                path: route,
                // Repeated parameters: the last one wins.
                param: Array.isArray(param) ? param[param.length - 1] : param,
                authorization: request.headers.authorization,
            });
            return reply.code(response.status).send(response.body);
        });
    }

    return app;
}
