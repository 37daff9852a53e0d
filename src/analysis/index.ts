export * from './analysis.module';
export * from './analysis.service';
