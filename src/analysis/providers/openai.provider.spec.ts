import OpenAI from 'openai';
import { ProviderConfig } from '../interfaces';
import { REAGENTS_SYSTEM_PROMPT, buildReagentsPrompt } from '../prompts';
import { OpenAIProvider } from './openai.provider';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
    __esModule: true,
    default: jest.fn().mockImplementation(() => ({
        chat: { completions: { create: mockCreate } },
    })),
    APIConnectionError: class APIConnectionError extends Error {
        constructor({ message }: { message?: string } = {}) {
            super(message ?? 'Connection error.');
        }
    },
}));

const config: ProviderConfig = {
    modelIdentifier: 'gpt-4o-mini',
    temperature: 0.3,
    maxOutputTokens: 2000,
    apiKey: 'test-openai-key',
};

describe('OpenAIProvider', () => {
    let provider: OpenAIProvider;

    beforeEach(() => {
        mockCreate.mockReset();
        provider = new OpenAIProvider(config);
    });

    it('builds the client with the configured key and no SDK retries', () => {
        expect(OpenAI).toHaveBeenCalledWith({ apiKey: 'test-openai-key', maxRetries: 0 });
    });

    it('requests JSON mode and mentions JSON in the system message', async () => {
        mockCreate.mockResolvedValue({ choices: [{ message: { content: '{"success_probability": 90}' } }] });

        const result = await provider.analyze('protocol');

        const request = mockCreate.mock.calls[0][0];
        expect(request.response_format).toEqual({ type: 'json_object' });
        expect(request.messages[0]).toEqual({
            role: 'system',
            content:
                'You are an expert scientific protocol reviewer with deep knowledge of experimental design, ' +
                'safety protocols, and common experimental pitfalls. Analyze protocols critically but constructively. ' +
                'Return only valid JSON.',
        });
        expect(request).toMatchObject({ model: 'gpt-4o-mini', temperature: 0.3, max_tokens: 2000 });
        expect(result.successProbability).toBe(90);
    });

    it('extracts reagents with the reagent settings and recomputes the total', async () => {
        mockCreate.mockResolvedValue({
            choices: [
                {
                    message: {
                        content: JSON.stringify({
                            categories: [
                                {
                                    name: 'Enzymes',
                                    items: [
                                        { name: 'Trypsin', quantity: '100 mL', estimated_price: 85.25 },
                                        { name: 'DNase I', estimated_price: 120 },
                                    ],
                                },
                            ],
                            total_cost: 1,
                        }),
                    },
                },
            ],
        });

        const list = await provider.extractReagents('Materials: Trypsin, DNase I');

        expect(mockCreate).toHaveBeenCalledWith({
            model: 'gpt-4o-mini',
            messages: [
                { role: 'system', content: `${REAGENTS_SYSTEM_PROMPT} Return only valid JSON.` },
                { role: 'user', content: buildReagentsPrompt('Materials: Trypsin, DNase I') },
            ],
            temperature: 0.4,
            max_tokens: 2500,
            response_format: { type: 'json_object' },
        });
        expect(list.totalCost).toBe(205.25);
        expect(list.categories[0].items.map((item) => item.name)).toEqual(['Trypsin', 'DNase I']);
    });

    it('does not leak the key through authentication errors', async () => {
        mockCreate.mockRejectedValue(
            Object.assign(new Error('Incorrect API key provided: test-openai-key'), { status: 401 }),
        );

        const error = await provider.analyze('protocol').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(Error);
        expect(error instanceof Error ? error.message : '').toBe('openai rejected the configured credential (HTTP 401)');
    });
});
