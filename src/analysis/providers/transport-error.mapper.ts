/**
 * @fileoverview Transport error classification
 *
 * The Groq, Anthropic and OpenAI SDKs all raise errors carrying the HTTP `status`
 * of a rejected call, and connection errors without one. Classification reads only
 * that field; providers decide beforehand which status-less errors are connection
 * failures.
 */

import { TransportError, TransportFailure } from '../../shared/errors';

export function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

export function classifyFailure(status: number | undefined): TransportFailure {
    if (status === undefined) {
        return 'network';
    }
    if (status === 401 || status === 403) {
        return 'authentication';
    }
    if (status === 429) {
        return 'rate_limit';
    }
    return 'upstream';
}

function scrub(message: string, secret: string): string {
    return secret ? message.split(secret).join('[redacted]') : message;
}

/**
 * Wraps an SDK failure in a {@link TransportError}.
 *
 * @remarks
 * Security: authentication failures get a fixed message because some backends echo a
 * masked form of the key; every other message has the key removed.
 */
export function toTransportError(provider: string, error: unknown, apiKey: string): TransportError {
    if (error instanceof TransportError) {
        return error;
    }

    const status = statusOf(error);
    const failure = classifyFailure(status);

    if (failure === 'authentication') {
        return new TransportError(provider, failure, `${provider} rejected the configured credential (HTTP ${status})`, status);
    }

    const detail = error instanceof Error ? error.message : String(error);
    const prefix = status === undefined ? `${provider} request failed` : `${provider} request failed (HTTP ${status})`;
    return new TransportError(provider, failure, scrub(`${prefix}: ${detail}`, apiKey), status);
}
