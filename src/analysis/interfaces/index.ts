export * from './analysis-result.interface';
export * from './llm-provider.interface';
export * from './provider-config.interface';
