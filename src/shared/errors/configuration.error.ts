/**
 * Raised when the process configuration cannot produce a usable LLM provider:
 * an unknown provider name, or a missing credential for the selected one.
 *
 * Thrown while the application bootstraps, so a misconfigured process never serves requests.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
