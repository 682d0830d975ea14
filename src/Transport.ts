/**
 * Transport: stdio and SSE Serving
 *
 * - stdio: a single Server over stdin/stdout
 * - sse:   an HTTP server; `GET /sse` opens a session with its own Server,
 *          `POST /messages?sessionId=…` delivers client messages to it
 */
import { createServer as createHttpServer } from 'node:http';
import type { IncomingMessage, Server as HttpServer, ServerResponse } from 'node:http';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from './Logger.js';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';

// ── stdio ───────────────────────────────────────────────────────────

export async function serveStdio(server: Server): Promise<void> {
    await server.connect(new StdioServerTransport());
    logger.info('Pushover MCP server running on stdio');
}

// ── SSE ─────────────────────────────────────────────────────────────

export interface SseOptions {
    readonly host: string;
    readonly port: number;
    /** Called once per SSE session. */
    readonly createServer: () => Server;
}

/** Resolves once the HTTP server is listening. */
export function serveSse(options: SseOptions): Promise<HttpServer> {
    const sessions = new Map<string, SSEServerTransport>();

    async function openSession(res: ServerResponse): Promise<void> {
        const transport = new SSEServerTransport(MESSAGES_PATH, res);
        const { sessionId } = transport;

        sessions.set(sessionId, transport);
        res.on('close', () => {
            sessions.delete(sessionId);
            logger.debug({ sessionId }, 'SSE session closed');
        });

        await options.createServer().connect(transport);
        logger.debug({ sessionId }, 'SSE session opened');
    }

    async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);

        if (req.method === 'GET' && url.pathname === SSE_PATH) {
            await openSession(res);
            return;
        }

        if (req.method === 'POST' && url.pathname === MESSAGES_PATH) {
            const transport = sessions.get(url.searchParams.get('sessionId') ?? '');
            if (!transport) {
                res.writeHead(404).end('Unknown session');
                return;
            }
            await transport.handlePostMessage(req, res);
            return;
        }

        res.writeHead(404).end('Not found');
    }

    const httpServer = createHttpServer((req, res) => {
        handle(req, res).catch((err: unknown) => {
            logger.error({ err, url: req.url }, 'SSE request failed');
            if (!res.headersSent) res.writeHead(500);
            res.end();
        });
    });

    return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(options.port, options.host, () => {
            httpServer.off('error', reject);
            logger.info({ host: options.host, port: options.port }, 'Pushover MCP server listening (SSE)');
            resolve(httpServer);
        });
    });
}
