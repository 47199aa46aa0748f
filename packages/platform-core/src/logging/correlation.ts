/**
 * Correlation Context
 *
 * Async correlation ID management across playback cycles
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { LogContext } from './types';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

/**
 * Run function with correlation context
 */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}
