/**
 * Raised when Pushover credentials are missing or empty.
 * Thrown before any network call is attempted.
 */
export class ConfigurationError extends Error {
    override name = 'ConfigurationError';

    constructor(message: string) {
        super(message);
    }
}
