/**
 * `api-test-agent serve` — Serve the fixture API the generated tests target.
 *
 * Dependency direction: serve.ts → commander, fixture/server
 * Used by: cli/program.ts
 */

import { Command, InvalidArgumentError } from 'commander';
import { buildFixtureApp } from '../../fixture/server.js';
import type { AppContext } from '../context.js';
import { logger } from '../../utils/logger.js';

export function parsePort(value: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port < 0 || port > 65_535) {
        throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
    }
    return port;
}

export function createServeCommand(getContext: () => AppContext): Command {
    return new Command('serve')
        .description('Serve the fixture API locally')
        .option('-p, --port <port>', 'Port to listen on (default from config)', parsePort)
        .option('-H, --host <host>', 'Host to bind (default from config)')
        .option('--log-requests', 'Log every request')
        .action(async (options: { port?: number; host?: string; logRequests?: boolean }) => {
            const { config } = getContext();
            const app = buildFixtureApp({ logRequests: options.logRequests });

            const address = await app.listen({
                port: options.port ?? config.fixture.port,
                host: options.host ?? config.fixture.host,
            });
            logger.success(`Fixture API listening on ${address}`);
        });
}
