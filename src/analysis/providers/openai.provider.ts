/**
 * @fileoverview OpenAI LLM Provider
 *
 * Balanced-cost backend using OpenAI chat completions.
 */

import OpenAI, { APIConnectionError } from 'openai';
import { ProviderConfig, ProviderName } from '../interfaces';
import { BaseLLMProvider, CompletionRequest } from './base-llm.provider';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAIProvider extends BaseLLMProvider {
    private readonly client: OpenAI;

    constructor(config: ProviderConfig) {
        super(config);
        this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    }

    getName(): ProviderName {
        return 'openai';
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
                // JSON mode requires the word "JSON" somewhere in the messages
                { role: 'system', content: `${request.system} Return only valid JSON.` },
                { role: 'user', content: request.prompt },
            ],
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            ...(request.structuredOutput ? { response_format: { type: 'json_object' as const } } : {}),
        });

        return response.choices[0]?.message?.content ?? '';
    }
}
