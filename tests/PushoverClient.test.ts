import { afterEach, describe, expect, it, vi } from 'vitest';
import { MockAgent } from 'undici';
import { PushoverClient } from '../src/PushoverClient.js';
import type { Credentials } from '../src/types.js';

// ── Mock Pushover API ───────────────────────────────────────────────

const ORIGIN = 'https://api.pushover.net';
const credentials: Credentials = { token: 'test-token', userKey: 'test-user' };

function createMockApi() {
    const agent = new MockAgent();
    agent.disableNetConnect();
    return { agent, pool: agent.get(ORIGIN) };
}

/** Client wired to a MockAgent; `captured.form` holds the last captured request body. */
function createClient(setup: (api: ReturnType<typeof createMockApi>, capture: (body: unknown) => void) => void) {
    const captured: { form: URLSearchParams } = { form: new URLSearchParams() };
    const api = createMockApi();
    setup(api, body => {
        captured.form = new URLSearchParams(String(body));
    });

    const client = new PushoverClient(credentials, { createDispatcher: () => api.agent });
    return { client, captured };
}

let open: PushoverClient[] = [];

function track(client: PushoverClient): PushoverClient {
    open.push(client);
    return client;
}

afterEach(async () => {
    await Promise.all(open.map(client => client.close()));
    open = [];
});

// ── sendMessage ─────────────────────────────────────────────────────

describe('PushoverClient.sendMessage', () => {
    it('returns success with the request id', async () => {
        const { client } = createClient(({ pool }) => {
            pool.intercept({ path: '/1/messages.json', method: 'POST' })
                .reply(200, { status: 1, request: 'req123' });
        });

        const result = await track(client).sendMessage({ message: 'Hello' });

        expect(result.success).toBe(true);
        expect(result.requestId).toBe('req123');
        expect(result.errors).toEqual([]);
        expect(result.raw).toEqual({ status: 1, request: 'req123' });
    });

    it('returns the API errors on rejection without throwing', async () => {
        const { client } = createClient(({ pool }) => {
            pool.intercept({ path: '/1/messages.json', method: 'POST' })
                .reply(400, { status: 0, request: 'err123', errors: ['invalid token'] });
        });

        const result = await track(client).sendMessage({ message: 'x' });

        expect(result.success).toBe(false);
        expect(result.requestId).toBe('err123');
        expect(result.errors).toEqual(['invalid token']);
    });

    it('posts a form-encoded body with all options', async () => {
        const { client, captured } = createClient(({ pool }, capture) => {
            pool.intercept({ path: '/1/messages.json', method: 'POST' })
                .reply(opts => {
                    capture(opts.body);
                    return { statusCode: 200, data: { status: 1, request: 'req456' } };
                });
        });

        await track(client).sendMessage({
            message: 'Test message',
            title: 'Test Title',
            priority: 1,
            sound: 'siren',
            device: 'iphone',
            url: 'https://example.com',
            urlTitle: 'Example',
            html: true,
            ttl: 3600,
            timestamp: 1234567890,
        });

        expect(Object.fromEntries(captured.form)).toEqual({
            token: 'test-token',
            user: 'test-user',
            message: 'Test message',
            title: 'Test Title',
            priority: '1',
            sound: 'siren',
            device: 'iphone',
            url: 'https://example.com',
            url_title: 'Example',
            html: '1',
            ttl: '3600',
            timestamp: '1234567890',
        });
    });

    it('sends the configured emergency retry schedule', async () => {
        const api = createMockApi();
        let form = new URLSearchParams();
        api.pool.intercept({ path: '/1/messages.json', method: 'POST' })
            .reply(opts => {
                form = new URLSearchParams(String(opts.body));
                return { statusCode: 200, data: { status: 1, request: 'r' } };
            });

        const client = track(new PushoverClient(credentials, {
            createDispatcher: () => api.agent,
            emergency: { retry: 120, expire: 7200 },
        }));
        await client.sendMessage({ message: 'down', priority: 2 });

        expect(form.get('retry')).toBe('120');
        expect(form.get('expire')).toBe('7200');
    });

    it('propagates a non-JSON response as an error', async () => {
        const { client } = createClient(({ pool }) => {
            pool.intercept({ path: '/1/messages.json', method: 'POST' })
                .reply(502, '<html>Bad Gateway</html>');
        });

        await expect(track(client).sendMessage({ message: 'x' })).rejects.toThrow();
    });

    it('propagates network failures', async () => {
        const { client } = createClient(({ pool }) => {
            pool.intercept({ path: '/1/messages.json', method: 'POST' })
                .replyWithError(new Error('socket hang up'));
        });

        await expect(track(client).sendMessage({ message: 'x' })).rejects.toThrow('socket hang up');
    });
});

// ── validateUser ────────────────────────────────────────────────────

describe('PushoverClient.validateUser', () => {
    it('returns devices and licenses', async () => {
        const { client } = createClient(({ pool }) => {
            pool.intercept({ path: '/1/users/validate.json', method: 'POST' })
                .reply(200, { status: 1, devices: ['iphone', 'desktop'], licenses: ['iOS'] });
        });

        expect(await track(client).validateUser()).toEqual({
            valid: true,
            devices: ['iphone', 'desktop'],
            licenses: ['iOS'],
            errors: [],
        });
    });

    it('forwards the device when given', async () => {
        const { client, captured } = createClient(({ pool }, capture) => {
            pool.intercept({ path: '/1/users/validate.json', method: 'POST' })
                .reply(opts => {
                    capture(opts.body);
                    return { statusCode: 400, data: { status: 0, errors: ['device name is not valid for user'] } };
                });
        });

        const result = await track(client).validateUser('toaster');

        expect(captured.form.get('device')).toBe('toaster');
        expect(result).toEqual({
            valid: false,
            devices: [],
            licenses: [],
            errors: ['device name is not valid for user'],
        });
    });
});

// ── getLimits ───────────────────────────────────────────────────────

describe('PushoverClient.getLimits', () => {
    it('returns limit, remaining and reset unmodified', async () => {
        let requestedPath = '';
        const { client } = createClient(({ pool }) => {
            pool.intercept({
                path: path => {
                    requestedPath = path;
                    return path.startsWith('/1/apps/limits.json');
                },
                method: 'GET',
            }).reply(200, { limit: 10000, remaining: 9500, reset: 1700000000, status: 1 });
        });

        const result = await track(client).getLimits();

        expect(result).toEqual({ limit: 10000, remaining: 9500, reset: 1700000000 });
        expect(requestedPath).toBe('/1/apps/limits.json?token=test-token');
    });

    it('defaults missing numbers to 0', async () => {
        const { client } = createClient(({ pool }) => {
            pool.intercept({ path: /^\/1\/apps\/limits\.json/, method: 'GET' })
                .reply(400, { status: 0, errors: ['application token is invalid'] });
        });

        expect(await track(client).getLimits()).toEqual({ limit: 0, remaining: 0, reset: 0 });
    });
});

// ── Connection lifecycle ────────────────────────────────────────────

describe('PushoverClient connection handle', () => {
    function validatingAgent(): MockAgent {
        const agent = new MockAgent();
        agent.disableNetConnect();
        agent.get(ORIGIN)
            .intercept({ path: '/1/users/validate.json', method: 'POST' })
            .reply(200, { status: 1, devices: ['iphone'], licenses: ['iOS'] })
            .persist();
        return agent;
    }

    it('is created lazily and reused across calls', async () => {
        const createDispatcher = vi.fn(validatingAgent);
        const client = track(new PushoverClient(credentials, { createDispatcher }));

        expect(createDispatcher).not.toHaveBeenCalled();

        await client.validateUser();
        await client.validateUser();

        expect(createDispatcher).toHaveBeenCalledTimes(1);
    });

    it('is recreated on the next call after close()', async () => {
        const createDispatcher = vi.fn(validatingAgent);
        const client = track(new PushoverClient(credentials, { createDispatcher }));

        await client.validateUser();
        await client.close();
        await client.validateUser();

        expect(createDispatcher).toHaveBeenCalledTimes(2);
    });

    it('close() is idempotent and a no-op before first use', async () => {
        const createDispatcher = vi.fn(validatingAgent);
        const client = new PushoverClient(credentials, { createDispatcher });

        await client.close();
        await client.validateUser();
        await client.close();
        await client.close();

        expect(createDispatcher).toHaveBeenCalledTimes(1);
    });
});
