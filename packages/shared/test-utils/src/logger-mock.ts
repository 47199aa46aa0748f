import { vi, type Mock } from 'vitest';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type MockLogger = Record<LogLevel, Mock> & { child: Mock };

/** Winston-shaped logger whose methods are all spies. */
export function createMockLogger(): MockLogger {
  const logger: MockLogger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
}

/** First argument of every call at `level`, in call order. */
export function loggedMessages(logger: MockLogger, level: LogLevel): string[] {
  return logger[level].mock.calls.map(call => String(call[0]));
}
