export * from './lib/sdk-node';
