/**
 * Platform Core - shared logging, error handling, configuration and
 * lifecycle utilities for mixdeck services.
 */

export * from './config/index';
export * from './error-handling/index';
export * from './logging/index';
export * from './resilience/index';
export * from './cache/index';
export * from './lifecycle/index';
