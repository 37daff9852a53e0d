/**
 * @fileoverview Groq LLM Provider
 *
 * Fast-inference backend using Groq chat completions (Llama models).
 *
 * @remarks
 * Supports JSON mode, so the response parser rarely needs its fallbacks.
 */

import Groq, { APIConnectionError } from 'groq-sdk';
import { ProviderConfig, ProviderName } from '../interfaces';
import { BaseLLMProvider, CompletionRequest } from './base-llm.provider';

export const GROQ_DEFAULT_MODEL = 'llama-3.3-70b-versatile';

export class GroqProvider extends BaseLLMProvider {
    private readonly client: Groq;

    constructor(config: ProviderConfig) {
        super(config);
        // Single attempt: the SDK would otherwise retry 429s and 5xx on its own
        this.client = new Groq({ apiKey: config.apiKey, maxRetries: 0 });
    }

    getName(): ProviderName {
        return 'groq';
    }

    supportsStructuredOutput(): boolean {
        return true;
    }

    protected isConnectionError(error: unknown): boolean {
        return error instanceof APIConnectionError;
    }

    protected async complete(request: CompletionRequest): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.config.modelIdentifier,
            messages: [
                { role: 'system', content: request.system },
                { role: 'user', content: request.prompt },
            ],
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            ...(request.structuredOutput ? { response_format: { type: 'json_object' as const } } : {}),
        });

        return response.choices[0]?.message?.content ?? '';
    }
}
