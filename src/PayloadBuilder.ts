/**
 * PayloadBuilder: Form Payloads for Pushover Requests
 *
 * Pure functions. Local validation never rejects a message: over-long
 * fields are truncated and unknown sounds are dropped.
 */
import { isSound } from './Sounds.js';
import type { Credentials, EmergencyPolicy, SendOptions } from './types.js';

// ── Limits ──────────────────────────────────────────────────────────

export const MAX_MESSAGE_LENGTH = 1024;
export const MAX_TITLE_LENGTH = 250;
export const MAX_URL_LENGTH = 512;
export const MAX_URL_TITLE_LENGTH = 100;

export const EMERGENCY_PRIORITY = 2;

/** Re-notify every minute for an hour. */
export const DEFAULT_EMERGENCY_POLICY: EmergencyPolicy = Object.freeze({
    retry: 60,
    expire: 3600,
});

// ── Builders ────────────────────────────────────────────────────────

/**
 * Truncate to at most `max` characters. Counts code points, so an emoji
 * at the boundary is never split in half.
 */
export function truncate(value: string, max: number): string {
    if (value.length <= max) return value;
    return Array.from(value).slice(0, max).join('');
}

/**
 * Build the `POST /messages.json` form body.
 *
 * - `priority` is only sent when non-zero
 * - priority 2 also carries `retry` / `expire` from the emergency policy
 * - empty optional strings are omitted
 */
export function buildMessagePayload(
    credentials: Credentials,
    options: SendOptions,
    emergency: EmergencyPolicy = DEFAULT_EMERGENCY_POLICY,
): URLSearchParams {
    const form = credentialForm(credentials);
    form.set('message', truncate(options.message, MAX_MESSAGE_LENGTH));

    if (options.title) form.set('title', truncate(options.title, MAX_TITLE_LENGTH));

    const priority = options.priority ?? 0;
    if (priority !== 0) {
        form.set('priority', String(priority));
        if (priority === EMERGENCY_PRIORITY) {
            form.set('retry', String(emergency.retry));
            form.set('expire', String(emergency.expire));
        }
    }

    if (isSound(options.sound)) form.set('sound', options.sound);
    if (options.device) form.set('device', options.device);
    if (options.url) form.set('url', truncate(options.url, MAX_URL_LENGTH));
    if (options.urlTitle) form.set('url_title', truncate(options.urlTitle, MAX_URL_TITLE_LENGTH));
    if (options.html) form.set('html', '1');
    if (options.ttl !== undefined) form.set('ttl', String(options.ttl));
    if (options.timestamp !== undefined) form.set('timestamp', String(options.timestamp));

    return form;
}

/** Build the `POST /users/validate.json` form body. */
export function buildValidatePayload(credentials: Credentials, device?: string): URLSearchParams {
    const form = credentialForm(credentials);
    if (device) form.set('device', device);
    return form;
}

function credentialForm(credentials: Credentials): URLSearchParams {
    return new URLSearchParams({ token: credentials.token, user: credentials.userKey });
}
