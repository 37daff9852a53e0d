/**
 * @fileoverview LLM Provider Interface
 *
 * Abstraction layer for LLM providers (Groq, Claude, OpenAI).
 * Allows swapping providers without changing business logic.
 */

import {
    AnalysisResult,
    FixSuggestion,
    FixToApply,
    ImprovedProtocol,
    ShoppingList,
} from './analysis-result.interface';
import { ProviderName } from './provider-config.interface';

/**
 * LLM provider interface for protocol review operations.
 *
 * Every operation makes a single backend call. Transport failures reject with a
 * `TransportError`; malformed model output never rejects.
 */
export interface LLMProvider {
    /**
     * Assesses a protocol for risks and estimates its success probability.
     *
     * @param protocolText - Extracted protocol text (non-empty)
     */
    analyze(protocolText: string): Promise<AnalysisResult>;

    /**
     * Proposes a concrete fix for one identified issue.
     */
    generateFix(issue: string, description: string, protocolContext: string): Promise<FixSuggestion>;

    /**
     * Rewrites the protocol with only the selected fixes applied.
     */
    improveProtocol(originalProtocol: string, fixes: FixToApply[]): Promise<ImprovedProtocol>;

    /**
     * Builds a priced shopping list from the protocol's Materials section.
     */
    extractReagents(protocolText: string): Promise<ShoppingList>;

    /**
     * Whether the backend can be told to emit only a JSON object.
     */
    supportsStructuredOutput(): boolean;

    /**
     * Returns the provider name for logging/metrics.
     */
    getName(): ProviderName;
}

/**
 * Token to inject the active LLM provider.
 */
export const LLM_PROVIDER = 'LLM_PROVIDER';
