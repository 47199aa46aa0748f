export * from './env-utils';
