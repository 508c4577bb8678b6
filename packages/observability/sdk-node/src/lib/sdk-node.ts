// Re-export everything from the module files
export * from './dsn';
export * from './config';
export * from './source-context';
export * from './stacktrace';
export * from './event-builder';
export * from './event-gate';
export * from './serializer';
export * from './transport';
export * from './dispatcher';
export * from './client';
export * from './logged-error-adapter';
export * from './monitor';
export * from './test-event';
