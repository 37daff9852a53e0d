/**
 * @fileoverview Base LLM Provider
 *
 * Shared skeleton for every backend: prompt construction, one backend call, error
 * classification and response parsing. Subclasses only translate a
 * {@link CompletionRequest} into their SDK's request shape.
 */

import { Logger } from '@nestjs/common';
import { Histogram } from 'prom-client';
import {
    AnalysisResult,
    FixSuggestion,
    FixToApply,
    ImprovedProtocol,
    LLMProvider,
    ProviderConfig,
    ProviderName,
    ShoppingList,
} from '../interfaces';
import {
    ANALYSIS_SYSTEM_PROMPT,
    FIX_SYSTEM_PROMPT,
    IMPROVE_SYSTEM_PROMPT,
    REAGENTS_SYSTEM_PROMPT,
    buildAnalysisPrompt,
    buildFixPrompt,
    buildImprovePrompt,
    buildReagentsPrompt,
} from '../prompts';
import {
    isDegradedAnalysis,
    parseAnalysisResponse,
    parseFixResponse,
    parseImproveResponse,
    parseReagentsResponse,
} from '../parsing';
import { TransportError } from '../../shared/errors';
import { statusOf, toTransportError } from './transport-error.mapper';

const llmCallDuration = new Histogram({
    name: 'protocol_llm_call_duration_seconds',
    help: 'Duration of LLM backend calls',
    labelNames: ['provider', 'operation', 'status'],
    buckets: [0.5, 1, 2.5, 5, 10, 20, 40],
});

export type Operation = 'analyze' | 'fix' | 'improve' | 'reagents';

export interface CompletionRequest {
    system: string;
    prompt: string;
    temperature: number;
    maxTokens: number;
    /** Ask the backend for a bare JSON object, where it supports that */
    structuredOutput: boolean;
}

export interface GenerationSettings {
    temperature: number;
    maxTokens: number;
}

/** Settings for the follow-up operations; analysis uses the provider config. */
export const FOLLOW_UP_SETTINGS: Record<Exclude<Operation, 'analyze'>, GenerationSettings> = {
    fix: { temperature: 0.4, maxTokens: 1000 },
    improve: { temperature: 0.5, maxTokens: 4000 },
    reagents: { temperature: 0.4, maxTokens: 2500 },
};

export abstract class BaseLLMProvider implements LLMProvider {
    protected readonly logger = new Logger(this.constructor.name);

    constructor(protected readonly config: ProviderConfig) { }

    abstract getName(): ProviderName;

    abstract supportsStructuredOutput(): boolean;

    /**
     * Performs the backend call and returns the model's text. No retries.
     */
    protected abstract complete(request: CompletionRequest): Promise<string>;

    /**
     * Whether `error` is the SDK's connection failure (including timeouts), raised
     * before any HTTP status was received.
     */
    protected abstract isConnectionError(error: unknown): boolean;

    async analyze(protocolText: string): Promise<AnalysisResult> {
        const raw = await this.send('analyze', {
            system: ANALYSIS_SYSTEM_PROMPT,
            prompt: buildAnalysisPrompt(protocolText),
            temperature: this.config.temperature,
            maxTokens: this.config.maxOutputTokens,
        });

        const result = parseAnalysisResponse(raw);
        if (isDegradedAnalysis(result)) {
            this.logger.warn({
                msg: 'Model output could not be parsed, returning degraded analysis',
                provider: this.getName(),
                model: this.config.modelIdentifier,
                outputLength: raw.length,
            });
        }
        return result;
    }

    async generateFix(issue: string, description: string, protocolContext: string): Promise<FixSuggestion> {
        const raw = await this.send('fix', {
            system: FIX_SYSTEM_PROMPT,
            prompt: buildFixPrompt(issue, description, protocolContext),
            ...FOLLOW_UP_SETTINGS.fix,
        });
        return parseFixResponse(raw);
    }

    async improveProtocol(originalProtocol: string, fixes: FixToApply[]): Promise<ImprovedProtocol> {
        const raw = await this.send('improve', {
            system: IMPROVE_SYSTEM_PROMPT,
            prompt: buildImprovePrompt(originalProtocol, fixes),
            ...FOLLOW_UP_SETTINGS.improve,
        });
        return parseImproveResponse(raw, originalProtocol);
    }

    async extractReagents(protocolText: string): Promise<ShoppingList> {
        const raw = await this.send('reagents', {
            system: REAGENTS_SYSTEM_PROMPT,
            prompt: buildReagentsPrompt(protocolText),
            ...FOLLOW_UP_SETTINGS.reagents,
        });
        return parseReagentsResponse(raw);
    }

    private async send(operation: Operation, request: Omit<CompletionRequest, 'structuredOutput'>): Promise<string> {
        const provider = this.getName();
        const endTimer = llmCallDuration.startTimer({ provider, operation });

        try {
            const text = await this.complete({ ...request, structuredOutput: this.supportsStructuredOutput() });
            endTimer({ status: 'success' });
            this.logger.debug({ msg: 'LLM call completed', provider, operation, model: this.config.modelIdentifier });
            return text;
        } catch (error) {
            endTimer({ status: 'error' });

            // Only HTTP rejections and connection errors are transport failures
            if (!(error instanceof TransportError) && statusOf(error) === undefined && !this.isConnectionError(error)) {
                this.logger.error({
                    msg: 'LLM call failed unexpectedly',
                    provider,
                    operation,
                    model: this.config.modelIdentifier,
                    error: error instanceof Error ? error.message : String(error),
                });
                throw error;
            }

            const transportError = toTransportError(provider, error, this.config.apiKey);
            this.logger.error({
                msg: 'LLM call failed',
                provider,
                operation,
                model: this.config.modelIdentifier,
                failure: transportError.failure,
                status: transportError.status,
                error: transportError.message,
            });
            throw transportError;
        }
    }
}
