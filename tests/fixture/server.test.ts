/**
 * Tests for the fixture HTTP server, driven through fastify's inject().
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildFixtureApp } from '../../src/fixture/server.js';

describe('fixture server', () => {
    let app: FastifyInstance;

    afterEach(async () => {
        await app.close();
    });

    it('returns success for param=max', async () => {
        app = buildFixtureApp();

        const res = await app.inject({ method: 'GET', url: '/api/endpoint?param=max' });

        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ result: 'success' });
    });

    it('passes the Authorization header through', async () => {
        app = buildFixtureApp();

        const res = await app.inject({
            method: 'GET',
            url: '/api/endpoint?param=random',
            headers: { authorization: 'Bearer invalid-api-key' },
        });

        expect(res.statusCode).toBe(403);
        expect(res.json()).toEqual({ detail: 'Forbidden' });
    });

    it('returns 401 without an Authorization header', async () => {
        app = buildFixtureApp();

        const res = await app.inject({ method: 'GET', url: '/api/endpoint?param=random' });

        expect(res.statusCode).toBe(401);
        expect(res.json()).toEqual({ detail: 'Unauthorized' });
    });

    it('uses the last value of a repeated param', async () => {
        app = buildFixtureApp();

        const res = await app.inject({ method: 'GET', url: '/api/endpoint?param=random&param=min' });

        expect(res.statusCode).toBe(200);
    });

    it('serves the fixed error routes', async () => {
        app = buildFixtureApp();

        const missing = await app.inject({ method: 'GET', url: '/api/nonexistent' });
        const broken = await app.inject({ method: 'GET', url: '/api/error' });

        expect(missing.statusCode).toBe(404);
        expect(missing.json()).toEqual({ detail: 'Non-existent endpoint' });
        expect(broken.statusCode).toBe(500);
        expect(broken.json()).toEqual({ detail: 'Server error' });
    });

    it('answers 404 for unregistered paths', async () => {
        app = buildFixtureApp();

        const res = await app.inject({ method: 'GET', url: '/api/unknown' });

        expect(res.statusCode).toBe(404);
    });
});
