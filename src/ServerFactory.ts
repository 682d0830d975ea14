/**
 * ServerFactory: MCP Server Construction
 *
 * Builds a low-level MCP `Server` whose `tools/list` and `tools/call`
 * handlers delegate to a ToolRouter. The SSE transport needs one Server per
 * connection; all of them can share the same router.
 */
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { ToolRouter } from './ToolRouter.js';

export const SERVER_INFO = Object.freeze({ name: 'pushover-mcp', version: '0.1.0' });

export function createServer(router: ToolRouter): Server {
    const server = new Server(
        { name: SERVER_INFO.name, version: SERVER_INFO.version },
        { capabilities: { tools: {} } },
    );

    server.setRequestHandler(ListToolsRequestSchema, () => router.listTools());

    server.setRequestHandler(CallToolRequestSchema, request =>
        router.callTool(request.params.name, request.params.arguments),
    );

    return server;
}
