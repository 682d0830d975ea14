/**
 * ConfigResolver: Ordered Credential Sources
 *
 * Credentials come from a list of named sources, consulted left to right.
 * For each field the first non-empty value wins; token and user key are
 * resolved independently, so one may come from the environment and the
 * other from the config file.
 *
 * Nothing here throws. A missing or broken config file contributes nothing,
 * and unresolved fields end up as empty strings. Callers check
 * `isValidCredentials()` afterwards.
 */
import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { Credentials } from './types.js';

// ── Constants ───────────────────────────────────────────────────────

export const TOKEN_ENV = 'PUSHOVER_TOKEN';
export const USER_KEY_ENV = 'PUSHOVER_USER_KEY';

const APP_DIR = 'pushover-mcp';
const CONFIG_FILE = 'config.json';

// ── Sources ─────────────────────────────────────────────────────────

export interface CredentialSource {
    /** Shown in debug logs and error messages. */
    readonly name: string;
    read(): Partial<Credentials>;
}

/** `PUSHOVER_TOKEN` / `PUSHOVER_USER_KEY`. Empty values count as absent. */
export function environmentSource(env: NodeJS.ProcessEnv = process.env): CredentialSource {
    return {
        name: 'environment',
        read: () => compact({ token: env[TOKEN_ENV], userKey: env[USER_KEY_ENV] }),
    };
}

/** On-disk JSON layout: `{ "token": "...", "user_key": "..." }`. */
const ConfigFileSchema = z.object({
    token: z.string().optional().catch(undefined),
    user_key: z.string().optional().catch(undefined),
});

/**
 * JSON config file source. Unreadable files, malformed JSON and
 * non-object documents all read as `{}`.
 */
export function fileSource(path: string = getConfigFilePath()): CredentialSource {
    return {
        name: `file:${path}`,
        read: () => {
            const parsed = ConfigFileSchema.safeParse(readJson(path));
            if (!parsed.success) return {};
            return compact({ token: parsed.data.token, userKey: parsed.data.user_key });
        },
    };
}

/**
 * `$XDG_CONFIG_HOME/pushover-mcp/config.json`, falling back to
 * `~/.config/pushover-mcp/config.json`.
 */
export function getConfigFilePath(env: NodeJS.ProcessEnv = process.env): string {
    const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
    return join(configHome, APP_DIR, CONFIG_FILE);
}

/** Environment first, then the config file. */
export function defaultSources(env: NodeJS.ProcessEnv = process.env): CredentialSource[] {
    return [environmentSource(env), fileSource(getConfigFilePath(env))];
}

// ── Resolution ──────────────────────────────────────────────────────

/**
 * Merge partial credentials left to right, first non-empty value per field.
 *
 * @example
 * mergeCredentials([{ token: 'a' }, { token: 'b', userKey: 'u' }])
 * // { token: 'a', userKey: 'u' }
 */
export function mergeCredentials(partials: Iterable<Partial<Credentials>>): Credentials {
    let token = '';
    let userKey = '';

    for (const partial of partials) {
        token ||= partial.token ?? '';
        userKey ||= partial.userKey ?? '';
    }

    return Object.freeze({ token, userKey });
}

/**
 * Resolve credentials from the given sources.
 * Sources are read lazily: once both fields are filled, the rest are skipped.
 */
export function resolveCredentials(
    sources: readonly CredentialSource[] = defaultSources(),
): Credentials {
    return mergeCredentials(readUntilComplete(sources));
}

export function isValidCredentials(credentials: Credentials): boolean {
    return credentials.token.length > 0 && credentials.userKey.length > 0;
}

// ── Helpers ─────────────────────────────────────────────────────────

function* readUntilComplete(sources: readonly CredentialSource[]): Generator<Partial<Credentials>> {
    let hasToken = false;
    let hasUserKey = false;

    for (const source of sources) {
        if (hasToken && hasUserKey) return;

        const partial = source.read();
        hasToken ||= Boolean(partial.token);
        hasUserKey ||= Boolean(partial.userKey);
        yield partial;
    }
}

function readJson(path: string): unknown {
    try {
        return JSON.parse(readFileSync(path, 'utf8'));
    } catch {
        // Missing, unreadable or malformed: treated as an empty file.
        return {};
    }
}

function compact(fields: { token?: string; userKey?: string }): Partial<Credentials> {
    const result: { token?: string; userKey?: string } = {};
    if (fields.token) result.token = fields.token;
    if (fields.userKey) result.userKey = fields.userKey;
    return result;
}
