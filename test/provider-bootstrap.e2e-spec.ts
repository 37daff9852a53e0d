import type { TestingModule } from '@nestjs/testing';

jest.mock('pdf-parse', () => jest.fn());

/**
 * Compiles the real AppModule (no provider override) against different environments.
 * Modules are reloaded per test because the environment is validated when ConfigModule loads.
 */
describe('Provider selection at bootstrap', () => {
    const originalEnv = process.env;

    const compileApp = async (): Promise<TestingModule> => {
        const { Test } = await import('@nestjs/testing');
        const { AppModule } = await import('../src/app.module');
        return Test.createTestingModule({ imports: [AppModule] }).compile();
    };

    beforeEach(() => {
        jest.resetModules();
        process.env = {
            ...originalEnv,
            NODE_ENV: 'test',
            LLM_PROVIDER: 'groq',
            GROQ_API_KEY: '',
            ANTHROPIC_API_KEY: '',
            OPENAI_API_KEY: '',
            GROQ_MODEL: '',
            ANTHROPIC_MODEL: '',
            OPENAI_MODEL: '',
        };
    });

    afterEach(() => {
        process.env = originalEnv;
    });

    it('starts when only the selected provider has a key and the others are blank', async () => {
        process.env.GROQ_API_KEY = 'test-groq-key';

        const moduleFixture = await compileApp();
        const { LLM_PROVIDER } = await import('../src/analysis/interfaces');

        const provider = moduleFixture.get<{ getName(): string }>(LLM_PROVIDER);
        expect(provider.getName()).toBe('groq');

        await moduleFixture.close();
    });

    it('fails with a ConfigurationError when the selected key is blank', async () => {
        const failure = await compileApp().catch((error: unknown) => error);
        const { ConfigurationError } = await import('../src/shared/errors');

        expect(failure).toBeInstanceOf(ConfigurationError);
        expect(failure).toMatchObject({ message: 'GROQ_API_KEY must be set when LLM_PROVIDER=groq' });
    });

    it('fails with a ConfigurationError for an unknown provider', async () => {
        process.env.LLM_PROVIDER = 'gemini';

        const failure = await compileApp().catch((error: unknown) => error);
        const { ConfigurationError } = await import('../src/shared/errors');

        expect(failure).toBeInstanceOf(ConfigurationError);
        expect(failure).toMatchObject({ message: 'Unknown LLM provider: gemini. Available: groq, claude, openai' });
    });
});
