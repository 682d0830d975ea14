/**
 * PushoverClient: Async Pushover REST Client
 *
 * Wraps three endpoints behind typed results:
 * - `POST /messages.json`        → sendMessage()
 * - `POST /users/validate.json`  → validateUser()
 * - `GET  /apps/limits.json`     → getLimits()
 *
 * Holds one undici dispatcher (the connection pool), created on first use
 * and recreated after `close()`. No retries; every request has a fixed
 * 30 s timeout. Network and JSON decode failures propagate to the caller.
 * API rejections do not throw: Pushover reports them in the body with
 * `status: 0`.
 */
import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import { logger } from './Logger.js';
import {
    DEFAULT_EMERGENCY_POLICY,
    buildMessagePayload,
    buildValidatePayload,
} from './PayloadBuilder.js';
import {
    parseLimitsResult,
    parseSendResult,
    parseValidationResult,
} from './ResponseParser.js';
import type {
    Credentials,
    EmergencyPolicy,
    LimitsResult,
    SendOptions,
    SendResult,
    ValidationResult,
} from './types.js';

export const PUSHOVER_API_BASE = 'https://api.pushover.net/1';
export const REQUEST_TIMEOUT_MS = 30_000;

export interface PushoverClientOptions {
    /** Defaults to `https://api.pushover.net/1`. */
    readonly apiBase?: string;
    /** retry/expire sent with priority 2 messages. */
    readonly emergency?: EmergencyPolicy;
    /** Connection handle factory. Called on first use and again after `close()`. */
    readonly createDispatcher?: () => Dispatcher;
}

function createAgent(): Dispatcher {
    return new Agent({
        connect: { timeout: REQUEST_TIMEOUT_MS },
        headersTimeout: REQUEST_TIMEOUT_MS,
        bodyTimeout: REQUEST_TIMEOUT_MS,
    });
}

export class PushoverClient {
    private readonly credentials: Credentials;
    private readonly apiBase: string;
    private readonly emergency: EmergencyPolicy;
    private readonly createDispatcher: () => Dispatcher;

    private dispatcher: Dispatcher | null = null;

    constructor(credentials: Credentials, options: PushoverClientOptions = {}) {
        this.credentials = credentials;
        this.apiBase = options.apiBase ?? PUSHOVER_API_BASE;
        this.emergency = options.emergency ?? DEFAULT_EMERGENCY_POLICY;
        this.createDispatcher = options.createDispatcher ?? createAgent;
    }

    /**
     * Send a notification.
     *
     * @example
     * const result = await client.sendMessage({ message: 'Deploy finished', priority: 1 });
     * if (!result.success) console.error(result.errors);
     */
    async sendMessage(options: SendOptions): Promise<SendResult> {
        const form = buildMessagePayload(this.credentials, options, this.emergency);
        return parseSendResult(await this.post('/messages.json', form));
    }

    /** Validate the user/group key, optionally for a single device. */
    async validateUser(device?: string): Promise<ValidationResult> {
        const form = buildValidatePayload(this.credentials, device);
        return parseValidationResult(await this.post('/users/validate.json', form));
    }

    /** Monthly message allowance for the application token. */
    async getLimits(): Promise<LimitsResult> {
        const query = new URLSearchParams({ token: this.credentials.token });
        return parseLimitsResult(await this.get('/apps/limits.json', query));
    }

    /** Release the connection pool. Safe to call repeatedly. */
    async close(): Promise<void> {
        const dispatcher = this.dispatcher;
        if (!dispatcher) return;

        this.dispatcher = null;
        await dispatcher.close();
    }

    // ── Transport ───────────────────────────────────────────────────

    private acquireDispatcher(): Dispatcher {
        this.dispatcher ??= this.createDispatcher();
        return this.dispatcher;
    }

    private post(endpoint: string, form: URLSearchParams): Promise<unknown> {
        logger.debug({ method: 'POST', endpoint }, 'Pushover request');

        return this.send(`${this.apiBase}${endpoint}`, {
            method: 'POST',
            headers: { 'content-type': 'application/x-www-form-urlencoded' },
            body: form.toString(),
        });
    }

    private get(endpoint: string, query: URLSearchParams): Promise<unknown> {
        // Query carries the token: log the endpoint only.
        logger.debug({ method: 'GET', endpoint }, 'Pushover request');

        return this.send(`${this.apiBase}${endpoint}?${query.toString()}`, { method: 'GET' });
    }

    private async send(
        url: string,
        init: { method: 'GET' | 'POST'; headers?: Record<string, string>; body?: string },
    ): Promise<unknown> {
        const { body } = await request(url, {
            ...init,
            dispatcher: this.acquireDispatcher(),
            headersTimeout: REQUEST_TIMEOUT_MS,
            bodyTimeout: REQUEST_TIMEOUT_MS,
        });
        return body.json();
    }
}
