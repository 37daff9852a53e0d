import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';

// `KEY=` lines (as in .env.example) count as unset
function blankAsUnset<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

// Zod schema for environment validation
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // LLM provider selection. Validated against the registry at bootstrap, not here,
    // so an unknown name surfaces as a ConfigurationError.
    LLM_PROVIDER: z.string().default('groq'),

    // Credentials: only the selected provider's key is required, and the registry checks it
    GROQ_API_KEY: blankAsUnset(z.string()),
    ANTHROPIC_API_KEY: blankAsUnset(z.string()),
    OPENAI_API_KEY: blankAsUnset(z.string()),

    // Model overrides
    GROQ_MODEL: blankAsUnset(z.string()),
    ANTHROPIC_MODEL: blankAsUnset(z.string()),
    OPENAI_MODEL: blankAsUnset(z.string()),

    // HTTP
    CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),

    // Log shipping
    LOKI_HOST: blankAsUnset(z.string().url()),
});

export type EnvConfig = z.infer<typeof envSchema>;

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            envFilePath: ['.env.local', '.env'],
            validate: (config) => {
                const result = envSchema.safeParse(config);
                if (!result.success) {
                    console.error('Invalid environment configuration:');
                    console.error(result.error.format());
                    throw new Error('Invalid environment configuration');
                }
                return result.data;
            },
        }),
    ],
    providers: [ConfigService],
    exports: [ConfigService],
})
export class ConfigModule { }
