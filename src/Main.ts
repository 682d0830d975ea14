/**
 * Main: CLI Options + Process Wiring
 *
 * Builds the dependency chain once (ClientProvider → PushoverTools →
 * ToolRouter) and hands the router to the selected transport.
 */
import type { Server as HttpServer } from 'node:http';
import { Command, Option } from 'commander';
import type { OutputConfiguration } from 'commander';
import { z } from 'zod';
import { ClientProvider } from './ClientProvider.js';
import { logger } from './Logger.js';
import { PushoverTools } from './PushoverTools.js';
import { SERVER_INFO, createServer } from './ServerFactory.js';
import { ToolRouter } from './ToolRouter.js';
import { serveSse, serveStdio } from './Transport.js';

// ── Options ─────────────────────────────────────────────────────────

const CliOptionsSchema = z.object({
    transport: z.enum(['stdio', 'sse']),
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function buildProgram(): Command {
    return new Command()
        .name(SERVER_INFO.name)
        .description('Pushover MCP Server - send notifications via MCP')
        .version(SERVER_INFO.version)
        .addOption(
            new Option('--transport <mode>', 'Transport mode: stdio (local clients) or sse (HTTP server)')
                .choices(['stdio', 'sse'])
                .default('stdio'),
        )
        .option('--host <host>', 'Host to bind to (SSE mode only)', '127.0.0.1')
        .option('--port <port>', 'Port to bind to (SSE mode only)', '8000');
}

/** Parse argv (including the node + script entries) into validated options. */
export function parseCliOptions(argv: readonly string[], output?: OutputConfiguration): CliOptions {
    const program = buildProgram().exitOverride();
    if (output) program.configureOutput(output);
    program.parse([...argv]);
    return CliOptionsSchema.parse(program.opts());
}

// ── Shutdown ────────────────────────────────────────────────────────

export interface ShutdownTargets {
    readonly provider: ClientProvider;
    /** Read at signal time; null in stdio mode. */
    readonly httpServer: () => HttpServer | null;
    readonly exit?: (code: number) => void;
}

/** Signal handler: stops the HTTP server, releases the Pushover client, then exits 0. */
export function createShutdown(targets: ShutdownTargets): (signal: string) => Promise<void> {
    const exit = targets.exit ?? ((code: number) => process.exit(code));

    return async signal => {
        logger.info({ signal }, 'Shutting down');
        targets.httpServer()?.close();
        try {
            await targets.provider.close();
        } catch (err) {
            logger.error({ err }, 'Failed to close Pushover client');
        }
        exit(0);
    };
}

// ── Main ────────────────────────────────────────────────────────────

export async function main(argv: readonly string[] = process.argv): Promise<void> {
    const options = parseCliOptions(argv);

    const provider = new ClientProvider();
    const router = new ToolRouter(new PushoverTools(provider));

    let httpServer: HttpServer | null = null;

    const shutdown = createShutdown({ provider, httpServer: () => httpServer });
    const onSignal = (signal: string): void => {
        void shutdown(signal);
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    if (options.transport === 'stdio') {
        const server = createServer(router);
        server.onclose = () => {
            provider.close().catch((err: unknown) => logger.error({ err }, 'Failed to close Pushover client'));
        };
        await serveStdio(server);
        return;
    }

    httpServer = await serveSse({
        host: options.host,
        port: options.port,
        createServer: () => createServer(router),
    });
}
