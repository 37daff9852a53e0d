/**
 * @fileoverview Provider Registry
 *
 * Maps a configured provider name to a constructed backend. Used once, while the
 * application bootstraps; holds no request-time state.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigurationError } from '../../shared/errors';
import { LLMProvider, PROVIDER_NAMES, ProviderConfig, ProviderEnv, ProviderName } from '../interfaces';
import { CLAUDE_DEFAULT_MODEL, ClaudeProvider } from './claude.provider';
import { GROQ_DEFAULT_MODEL, GroqProvider } from './groq.provider';
import { OPENAI_DEFAULT_MODEL, OpenAIProvider } from './openai.provider';

export const ANALYSIS_TEMPERATURE = 0.3;
export const ANALYSIS_MAX_OUTPUT_TOKENS = 2000;

/**
 * Token for the provider-related slice of the validated environment.
 */
export const PROVIDER_ENV = 'PROVIDER_ENV';

interface ProviderDefinition {
    credentialKey: 'GROQ_API_KEY' | 'ANTHROPIC_API_KEY' | 'OPENAI_API_KEY';
    modelKey: 'GROQ_MODEL' | 'ANTHROPIC_MODEL' | 'OPENAI_MODEL';
    defaultModel: string;
    create(config: ProviderConfig): LLMProvider;
}

const DEFINITIONS: Record<ProviderName, ProviderDefinition> = {
    groq: {
        credentialKey: 'GROQ_API_KEY',
        modelKey: 'GROQ_MODEL',
        defaultModel: GROQ_DEFAULT_MODEL,
        create: (config) => new GroqProvider(config),
    },
    claude: {
        credentialKey: 'ANTHROPIC_API_KEY',
        modelKey: 'ANTHROPIC_MODEL',
        defaultModel: CLAUDE_DEFAULT_MODEL,
        create: (config) => new ClaudeProvider(config),
    },
    openai: {
        credentialKey: 'OPENAI_API_KEY',
        modelKey: 'OPENAI_MODEL',
        defaultModel: OPENAI_DEFAULT_MODEL,
        create: (config) => new OpenAIProvider(config),
    },
};

export function toProviderName(name: string): ProviderName | undefined {
    return PROVIDER_NAMES.find((candidate) => candidate === name);
}

@Injectable()
export class ProviderRegistry {
    private readonly logger = new Logger(ProviderRegistry.name);

    constructor(@Inject(PROVIDER_ENV) private readonly env: ProviderEnv) { }

    names(): ProviderName[] {
        return [...PROVIDER_NAMES];
    }

    /**
     * Builds the provider for `configuredName` (case-sensitive).
     *
     * @throws ConfigurationError for an unknown name or a missing credential
     */
    select(configuredName: string): LLMProvider {
        const name = toProviderName(configuredName);
        if (!name) {
            throw new ConfigurationError(
                `Unknown LLM provider: ${configuredName}. Available: ${PROVIDER_NAMES.join(', ')}`,
            );
        }

        const definition = DEFINITIONS[name];
        const apiKey = this.env[definition.credentialKey];
        if (!apiKey) {
            throw new ConfigurationError(`${definition.credentialKey} must be set when LLM_PROVIDER=${name}`);
        }

        const config: ProviderConfig = Object.freeze({
            modelIdentifier: this.env[definition.modelKey] || definition.defaultModel,
            temperature: ANALYSIS_TEMPERATURE,
            maxOutputTokens: ANALYSIS_MAX_OUTPUT_TOKENS,
            apiKey,
        });

        this.logger.log({ msg: 'LLM provider selected', provider: name, model: config.modelIdentifier });
        return definition.create(config);
    }
}
