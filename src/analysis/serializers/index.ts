export * from './analysis-response.serializer';
