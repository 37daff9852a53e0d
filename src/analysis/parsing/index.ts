export * from './analysis-response.parser';
export * from './field-schemas';
export * from './fix-response.parser';
export * from './improve-response.parser';
export * from './json-extraction';
export * from './reagents-response.parser';
