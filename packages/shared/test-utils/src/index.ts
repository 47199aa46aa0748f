export { createMockLogger, loggedMessages, type MockLogger, type LogLevel } from './logger-mock';
export { InMemoryCache } from './in-memory-cache';
export { FakeSourceFetcher, FakeTranscoder, type FakeSource, type TranscodeCall } from './fakes';
export { pcmBytes, createTempDir, removeTempDir, deferred, flushAsync, type Deferred } from './pcm';
