import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExtractionModule } from '../extraction';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { LLM_PROVIDER, ProviderEnv } from './interfaces';
import { PROVIDER_ENV, ProviderRegistry } from './providers';

@Module({
    imports: [ExtractionModule],
    controllers: [AnalysisController],
    providers: [
        {
            provide: PROVIDER_ENV,
            inject: [ConfigService],
            useFactory: (config: ConfigService): ProviderEnv => ({
                GROQ_API_KEY: config.get<string>('GROQ_API_KEY'),
                ANTHROPIC_API_KEY: config.get<string>('ANTHROPIC_API_KEY'),
                OPENAI_API_KEY: config.get<string>('OPENAI_API_KEY'),
                GROQ_MODEL: config.get<string>('GROQ_MODEL'),
                ANTHROPIC_MODEL: config.get<string>('ANTHROPIC_MODEL'),
                OPENAI_MODEL: config.get<string>('OPENAI_MODEL'),
            }),
        },
        ProviderRegistry,
        {
            // Resolved during bootstrap: a bad LLM_PROVIDER or missing key stops startup
            provide: LLM_PROVIDER,
            inject: [ConfigService, ProviderRegistry],
            useFactory: (config: ConfigService, registry: ProviderRegistry) =>
                registry.select(config.get<string>('LLM_PROVIDER', 'groq')),
        },
        AnalysisService,
    ],
    exports: [LLM_PROVIDER],
})
export class AnalysisModule { }
