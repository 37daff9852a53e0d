/**
 * @fileoverview Transport Error
 *
 * A model backend call that produced no analysis at all. Distinct from a degraded
 * parse, which is reported in-band by the response parser.
 */

export type TransportFailure = 'authentication' | 'rate_limit' | 'network' | 'upstream';

export class TransportError extends Error {
    constructor(
        readonly provider: string,
        readonly failure: TransportFailure,
        message: string,
        readonly status?: number,
    ) {
        super(message);
        this.name = 'TransportError';
    }

    /**
     * Rate limits and connection failures may succeed later; rejected credentials
     * and other upstream errors will not.
     */
    get transient(): boolean {
        return this.failure === 'rate_limit' || this.failure === 'network';
    }
}
