export const PROVIDER_NAMES = ['groq', 'claude', 'openai'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * Per-process settings for the selected backend. Built once at startup and frozen.
 *
 * @remarks
 * Security: `apiKey` must never be logged or echoed in a response.
 */
export interface ProviderConfig {
    readonly modelIdentifier: string;
    readonly temperature: number;
    readonly maxOutputTokens: number;
    readonly apiKey: string;
}

/**
 * Environment values the registry reads. Mirrors the validated env schema.
 */
export interface ProviderEnv {
    GROQ_API_KEY?: string;
    ANTHROPIC_API_KEY?: string;
    OPENAI_API_KEY?: string;
    GROQ_MODEL?: string;
    ANTHROPIC_MODEL?: string;
    OPENAI_MODEL?: string;
}
