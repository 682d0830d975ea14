/**
 * ResponseParser: Decoded Pushover Bodies to Result Records
 *
 * Pure functions. Absent or mistyped fields fall back to defaults
 * (`''`, `[]`, `0`). A body that is not a JSON object is a decode
 * failure and throws.
 */
import { z } from 'zod';
import type { LimitsResult, SendResult, ValidationResult } from './types.js';

// ── Schemas ─────────────────────────────────────────────────────────

const stringList = z.array(z.string()).catch([]);

const StatusBody = z.object({
    status: z.number().optional().catch(undefined),
    errors: z.array(z.string()).optional().catch(undefined),
}).passthrough();

const MessageBody = StatusBody.extend({
    request: z.string().catch(''),
});

const ValidateBody = StatusBody.extend({
    devices: stringList,
    licenses: stringList,
});

const LimitsBody = z.object({
    limit: z.number().catch(0),
    remaining: z.number().catch(0),
    reset: z.number().catch(0),
});

// ── Parsers ─────────────────────────────────────────────────────────

export function parseSendResult(body: unknown): SendResult {
    const raw = expectObject(body);
    const parsed = MessageBody.parse(raw);

    return Object.freeze({
        success: parsed.status === 1,
        requestId: parsed.request,
        errors: Object.freeze(parsed.errors ?? []),
        raw: Object.freeze(raw),
    });
}

export function parseValidationResult(body: unknown): ValidationResult {
    const parsed = ValidateBody.parse(expectObject(body));

    return Object.freeze({
        valid: parsed.status === 1,
        devices: Object.freeze(parsed.devices),
        licenses: Object.freeze(parsed.licenses),
        errors: Object.freeze(parsed.errors ?? []),
    });
}

export function parseLimitsResult(body: unknown): LimitsResult {
    const parsed = LimitsBody.parse(expectObject(body));

    return Object.freeze({
        limit: parsed.limit,
        remaining: parsed.remaining,
        reset: parsed.reset,
    });
}

// ── Helpers ─────────────────────────────────────────────────────────

const JsonObject = z.record(z.unknown());

function expectObject(body: unknown): Record<string, unknown> {
    const result = JsonObject.safeParse(body);
    if (!result.success) {
        throw new Error(
            `Pushover: expected a JSON object response, received ${describe(body)}.`,
        );
    }
    return result.data;
}

function describe(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}
