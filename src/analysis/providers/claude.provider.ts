/**
 * @fileoverview Claude LLM Provider
 *
 * High-reasoning backend using the Anthropic Messages API.
 *
 * @remarks
 * The Messages API has no JSON mode. Output often arrives wrapped in a markdown
 * fence or with commentary, and relies entirely on the response parser's fallbacks.
 */

import Anthropic, { APIConnectionError } from '@anthropic-ai/sdk';
import { ProviderConfig, ProviderName } from '../interfaces';
import { BaseLLMProvider, CompletionRequest } from './base-llm.provider';

export const CLAUDE_DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';

export class ClaudeProvider extends BaseLLMProvider {
    private readonly client: Anthropic;

    constructor(config: ProviderConfig) {
        super(config);
        this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
    }

    getName(): ProviderName {
        return 'claude';
    }

    supportsStructuredOutput(): boolean {
        return false;
    }

    protected isConnectionError(error: unknown): boolean {
        return error instanceof APIConnectionError;
    }

    protected async complete(request: CompletionRequest): Promise<string> {
        const response = await this.client.messages.create({
            model: this.config.modelIdentifier,
            system: request.system,
            max_tokens: request.maxTokens,
            temperature: request.temperature,
            messages: [{ role: 'user', content: request.prompt }],
        });

        return response.content.map((block) => (block.type === 'text' ? block.text : '')).join('');
    }
}
