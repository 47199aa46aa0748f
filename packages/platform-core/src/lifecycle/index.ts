export * from './gracefulShutdown';
