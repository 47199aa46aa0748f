export type { Logger } from 'winston';

/** Request-scoped fields picked up by both log formats. */
export interface LogContext {
  correlationId?: string;
  sessionId?: string;
}

export interface LoggerMeta {
  service: string;
  env: string;
  instanceId: string;
}
