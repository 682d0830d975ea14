/**
 * ToolCatalog: MCP Tool Definitions + Argument Schemas
 *
 * Each tool pairs the JSON Schema advertised in `tools/list` with the zod
 * schema that parses `tools/call` arguments. Range checks that must produce
 * a tool-level error record (priority) are left to PushoverTools.
 */
import { z } from 'zod';
import { SOUNDS, URGENT_SOUND } from './Sounds.js';
import type { McpToolDef } from './types.js';

// ── Argument Schemas ────────────────────────────────────────────────

export const SendArgsSchema = z.object({
    message: z.string(),
    title: z.string().optional(),
    priority: z.number().default(0),
    sound: z.string().optional(),
    device: z.string().optional(),
    url: z.string().optional(),
    url_title: z.string().optional(),
    html: z.boolean().default(false),
    ttl: z.number().int().optional(),
    timestamp: z.number().int().optional(),
});

export const SendUrgentArgsSchema = z.object({
    message: z.string(),
    title: z.string().optional(),
    sound: z.string().default(URGENT_SOUND),
});

export const NoArgsSchema = z.object({});

export type SendArgs = z.infer<typeof SendArgsSchema>;
export type SendUrgentArgs = z.infer<typeof SendUrgentArgsSchema>;

// ── Tool Names ──────────────────────────────────────────────────────

export const TOOL_NAMES = Object.freeze({
    send: 'pushover_send',
    sendUrgent: 'pushover_send_urgent',
    validate: 'pushover_validate',
    limits: 'pushover_limits',
    health: 'pushover_health',
} as const);

export type ToolName = typeof TOOL_NAMES[keyof typeof TOOL_NAMES];

// ── Definitions ─────────────────────────────────────────────────────

const soundList = `${SOUNDS.slice(0, 10).join(', ')}…`;

const noArgs: McpToolDef['inputSchema'] = { type: 'object', properties: {} };

export const TOOL_DEFINITIONS: readonly McpToolDef[] = [
    {
        name: TOOL_NAMES.send,
        description:
            'Send a Pushover notification to the configured user/group, ' +
            'with optional title, priority, sound, target device and supplementary URL.',
        inputSchema: {
            type: 'object',
            properties: {
                message: { type: 'string', description: 'Message body (max 1024 characters)' },
                title: { type: 'string', description: 'Message title (max 250 characters)' },
                priority: {
                    type: 'integer',
                    description: 'Priority: -2 (silent), -1 (quiet), 0 (normal), 1 (high), 2 (emergency)',
                    default: 0,
                },
                sound: { type: 'string', description: `Notification sound: ${soundList}` },
                device: { type: 'string', description: 'Target a specific device name' },
                url: { type: 'string', description: 'Supplementary URL (max 512 characters)' },
                url_title: { type: 'string', description: 'Title for the supplementary URL (max 100 characters)' },
                html: { type: 'boolean', description: 'Enable HTML formatting in the message', default: false },
                ttl: { type: 'integer', description: 'Time to live in seconds (auto-delete)' },
                timestamp: { type: 'integer', description: 'Unix timestamp shown as the message time' },
            },
            required: ['message'],
        },
    },
    {
        name: TOOL_NAMES.sendUrgent,
        description:
            'Send an urgent high-priority (priority 1) Pushover notification with a loud sound. ' +
            'Use when the user\'s immediate attention is needed.',
        inputSchema: {
            type: 'object',
            properties: {
                message: { type: 'string', description: 'Urgent message body (max 1024 characters)' },
                title: { type: 'string', description: 'Message title (max 250 characters)' },
                sound: { type: 'string', description: 'Notification sound (default: siren)', default: URGENT_SOUND },
            },
            required: ['message'],
        },
    },
    {
        name: TOOL_NAMES.validate,
        description: 'Validate the configured Pushover credentials and list registered devices.',
        inputSchema: noArgs,
    },
    {
        name: TOOL_NAMES.limits,
        description:
            'Check the monthly Pushover message limit, remaining messages and ' +
            'when the limit resets (Unix timestamp).',
        inputSchema: noArgs,
    },
    {
        name: TOOL_NAMES.health,
        description: 'Check server health: confirms credentials are configured and accepted by Pushover.',
        inputSchema: noArgs,
    },
];
