export * from './lib/diagnostic-context';
