export * from './extraction.module';
export * from './pdf-text.service';
