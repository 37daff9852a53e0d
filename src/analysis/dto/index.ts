export * from './extract-reagents-request.dto';
export * from './generate-fix-request.dto';
export * from './improve-protocol-request.dto';
