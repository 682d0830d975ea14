/**
 * ClientProvider: Once-Only PushoverClient Construction
 *
 * Resolves credentials and builds the client on first `get()`. Invalid
 * credentials throw a ConfigurationError and leave nothing cached, so a
 * later call picks up configuration that was fixed in the meantime.
 */
import { ConfigurationError } from './ConfigurationError.js';
import { TOKEN_ENV, USER_KEY_ENV, isValidCredentials, resolveCredentials } from './ConfigResolver.js';
import { PushoverClient } from './PushoverClient.js';
import type { Credentials } from './types.js';

export const MISSING_CREDENTIALS_MESSAGE =
    'Pushover credentials not configured. ' +
    `Set ${TOKEN_ENV} and ${USER_KEY_ENV} environment variables, ` +
    'or create ~/.config/pushover-mcp/config.json';

export interface ClientProviderOptions {
    /** Credential lookup. Defaults to environment, then config file. */
    readonly resolve?: () => Credentials;
    readonly create?: (credentials: Credentials) => PushoverClient;
}

export class ClientProvider {
    private readonly resolve: () => Credentials;
    private readonly create: (credentials: Credentials) => PushoverClient;

    private client: PushoverClient | null = null;

    constructor(options: ClientProviderOptions = {}) {
        this.resolve = options.resolve ?? (() => resolveCredentials());
        this.create = options.create ?? (credentials => new PushoverClient(credentials));
    }

    /** Fresh credential lookup, independent of the cached client. */
    credentials(): Credentials {
        return this.resolve();
    }

    /**
     * @throws ConfigurationError when token or user key is empty
     */
    get(): PushoverClient {
        if (this.client) return this.client;

        const credentials = this.resolve();
        if (!isValidCredentials(credentials)) {
            throw new ConfigurationError(MISSING_CREDENTIALS_MESSAGE);
        }

        this.client = this.create(credentials);
        return this.client;
    }

    async close(): Promise<void> {
        const client = this.client;
        this.client = null;
        await client?.close();
    }
}
