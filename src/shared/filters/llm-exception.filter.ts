/**
 * @fileoverview LLM Exception Filter
 *
 * Maps provider failures to server-side HTTP responses. Degraded parses never reach
 * here; they are ordinary 200 responses.
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ConfigurationError, TransportError } from '../errors';

export interface LlmErrorBody {
    statusCode: number;
    error: string;
    message: string;
    provider?: string;
    failure?: string;
}

export function toErrorResponse(exception: ConfigurationError | TransportError): LlmErrorBody {
    if (exception instanceof TransportError) {
        const statusCode = exception.transient ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.BAD_GATEWAY;
        return {
            statusCode,
            error: exception.name,
            message: exception.message,
            provider: exception.provider,
            failure: exception.failure,
        };
    }

    return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: exception.name,
        message: 'LLM provider is not configured',
    };
}

@Catch(TransportError, ConfigurationError)
export class LlmExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(LlmExceptionFilter.name);

    catch(exception: ConfigurationError | TransportError, host: ArgumentsHost): void {
        const body = toErrorResponse(exception);
        this.logger.warn({ msg: 'Analysis request failed', statusCode: body.statusCode, error: exception.message });

        host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
    }
}
