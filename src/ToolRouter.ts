/**
 * ToolRouter: tools/list + tools/call Dispatch
 *
 * Parses arguments with the tool's zod schema, runs the matching
 * PushoverTools operation and serializes the record as one JSON text block.
 *
 * Nothing escapes `callTool()`: unknown tools, invalid arguments,
 * configuration errors and transport failures all come back as
 * `{ success: false, error }` with `isError: true`.
 */
import { ZodError } from 'zod';
import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from './Logger.js';
import type { PushoverTools, ToolRecord } from './PushoverTools.js';
import {
    NoArgsSchema,
    SendArgsSchema,
    SendUrgentArgsSchema,
    TOOL_DEFINITIONS,
    TOOL_NAMES,
} from './ToolCatalog.js';
import type { McpCallResult, McpToolDef } from './types.js';

// ── Routes ──────────────────────────────────────────────────────────

type Handler = (raw: Record<string, unknown>) => Promise<ToolRecord>;

function route<TArgs>(
    schema: ZodType<TArgs, ZodTypeDef, unknown>,
    run: (args: TArgs) => Promise<ToolRecord>,
): Handler {
    return raw => run(schema.parse(raw));
}

// ── Result Shaping ──────────────────────────────────────────────────

/** A record reporting failure: `success: false`, `valid: false` or `status: 'error'`. */
export function isFailureRecord(record: ToolRecord): boolean {
    if ('success' in record) return !record.success;
    if ('valid' in record) return !record.valid;
    if ('status' in record) return record.status === 'error';
    return false;
}

export function toCallResult(record: ToolRecord): McpCallResult {
    const result: McpCallResult = {
        content: [{ type: 'text', text: JSON.stringify(record, null, 2) }],
    };
    if (isFailureRecord(record)) result.isError = true;
    return result;
}

function describeError(err: unknown): string {
    if (err instanceof ZodError) {
        const issues = err.issues.map(issue =>
            issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        );
        return `Invalid arguments: ${issues.join('; ')}`;
    }
    return err instanceof Error ? err.message : String(err);
}

// ── ToolRouter ──────────────────────────────────────────────────────

export class ToolRouter {
    private readonly handlers: ReadonlyMap<string, Handler>;

    constructor(tools: PushoverTools) {
        this.handlers = new Map<string, Handler>([
            [TOOL_NAMES.send, route(SendArgsSchema, args => tools.send(args))],
            [TOOL_NAMES.sendUrgent, route(SendUrgentArgsSchema, args => tools.sendUrgent(args))],
            [TOOL_NAMES.validate, route(NoArgsSchema, () => tools.validate())],
            [TOOL_NAMES.limits, route(NoArgsSchema, () => tools.limits())],
            [TOOL_NAMES.health, route(NoArgsSchema, () => tools.health())],
        ]);
    }

    listTools(): { tools: McpToolDef[] } {
        return { tools: [...TOOL_DEFINITIONS] };
    }

    async callTool(name: string, args: Record<string, unknown> = {}): Promise<McpCallResult> {
        const handler = this.handlers.get(name);
        if (!handler) {
            logger.warn({ tool: name }, 'Unknown tool requested');
            return toCallResult({ success: false, error: `Unknown tool: ${name}` });
        }

        try {
            const record = await handler(args);
            logger.info({ tool: name, failed: isFailureRecord(record) }, 'Tool call completed');
            return toCallResult(record);
        } catch (err) {
            logger.error({ err, tool: name }, 'Tool call failed');
            return toCallResult({ success: false, error: describeError(err) });
        }
    }
}
