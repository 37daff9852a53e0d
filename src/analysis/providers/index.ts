export * from './base-llm.provider';
export * from './claude.provider';
export * from './groq.provider';
export * from './openai.provider';
export * from './provider.registry';
export * from './transport-error.mapper';
