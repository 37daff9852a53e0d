export * from './configuration.error';
export * from './transport.error';
