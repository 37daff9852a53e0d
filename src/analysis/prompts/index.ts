export * from './analysis-prompt.builder';
export * from './fix-prompt.builder';
export * from './improve-prompt.builder';
export * from './reagents-prompt.builder';
export * from './truncate';
