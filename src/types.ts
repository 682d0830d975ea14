/**
 * pushover-mcp: Public Types
 *
 * Credentials, outgoing message options and the three per-call result
 * records. Results are plain frozen objects, never mutated after return.
 */

// ── Credentials ─────────────────────────────────────────────────────

/** Pushover application token + user/group key. Valid iff both are non-empty. */
export interface Credentials {
    readonly token: string;
    readonly userKey: string;
}

// ── Priority ────────────────────────────────────────────────────────

/** -2 (silent) … 2 (emergency, re-notifies until acknowledged). */
export type Priority = -2 | -1 | 0 | 1 | 2;

/** Retry schedule attached to emergency (priority 2) messages. */
export interface EmergencyPolicy {
    /** Seconds between re-notifications. */
    readonly retry: number;
    /** Seconds after which re-notification stops. */
    readonly expire: number;
}

// ── Send Options ────────────────────────────────────────────────────

export interface SendOptions {
    /** Message body. Truncated to 1024 characters. */
    readonly message: string;
    /** Truncated to 250 characters. */
    readonly title?: string;
    readonly priority?: Priority;
    /** Dropped silently when not one of `SOUNDS`. */
    readonly sound?: string;
    readonly device?: string;
    /** Truncated to 512 characters. */
    readonly url?: string;
    /** Truncated to 100 characters. */
    readonly urlTitle?: string;
    readonly html?: boolean;
    /** Seconds until the message is deleted from devices. */
    readonly ttl?: number;
    /** Unix seconds shown as the message time. */
    readonly timestamp?: number;
}

// ── Results ─────────────────────────────────────────────────────────

export interface SendResult {
    readonly success: boolean;
    readonly requestId: string;
    readonly errors: readonly string[];
    /** Full decoded response body, kept for diagnostics. */
    readonly raw: Readonly<Record<string, unknown>>;
}

export interface ValidationResult {
    readonly valid: boolean;
    readonly devices: readonly string[];
    readonly licenses: readonly string[];
    readonly errors: readonly string[];
}

export interface LimitsResult {
    readonly limit: number;
    readonly remaining: number;
    /** Unix seconds at which `remaining` resets to `limit`. */
    readonly reset: number;
}

// ── MCP Protocol Types ──────────────────────────────────────────────
//
// Declared as type aliases: the SDK's passthrough result schemas carry an
// index signature that interfaces do not satisfy.

/** MCP tool definition as returned from `tools/list`. */
export type McpToolDef = {
    name: string;
    description: string;
    inputSchema: {
        type: 'object';
        properties: Record<string, unknown>;
        required?: string[];
    };
};

/** MCP `tools/call` result carrying a single JSON text block. */
export type McpCallResult = {
    content: Array<{ type: 'text'; text: string }>;
    isError?: boolean;
};
