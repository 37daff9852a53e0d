import { envSchema } from './config.module';

describe('envSchema', () => {
    it('treats blank credentials and model overrides as unset', () => {
        const env = envSchema.parse({
            LLM_PROVIDER: 'groq',
            GROQ_API_KEY: 'test-groq-key',
            ANTHROPIC_API_KEY: '',
            OPENAI_API_KEY: '',
            GROQ_MODEL: '',
            LOKI_HOST: '',
        });

        expect(env.GROQ_API_KEY).toBe('test-groq-key');
        expect(env.ANTHROPIC_API_KEY).toBeUndefined();
        expect(env.OPENAI_API_KEY).toBeUndefined();
        expect(env.GROQ_MODEL).toBeUndefined();
        expect(env.LOKI_HOST).toBeUndefined();
    });

    it('applies defaults', () => {
        const env = envSchema.parse({});

        expect(env.PORT).toBe(8000);
        expect(env.LLM_PROVIDER).toBe('groq');
        expect(env.CORS_ORIGINS).toBe('http://localhost:5173,http://127.0.0.1:5173');
    });

    it('still rejects a malformed Loki host', () => {
        expect(envSchema.safeParse({ LOKI_HOST: 'not a url' }).success).toBe(false);
    });
});
