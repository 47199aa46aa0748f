import { describe, it, expect } from 'vitest';
import { createProdFormat, maskSecrets, maskSignedUrl } from '../logging/formatting';
import { createLogger } from '../logging/logger';

describe('maskSignedUrl', () => {
  it('should hide signature and expiry query values', () => {
    expect(maskSignedUrl('https://media.example/v?id=1&sig=abc&expire=9')).toBe(
      'https://media.example/v?id=1&sig=***&expire=***'
    );
  });
});

describe('maskSecrets', () => {
  it('should redact secret-looking keys at any depth', () => {
    expect(maskSecrets({ token: 'a', nested: { password: 'b', ok: 1 } })).toEqual({
      token: '[REDACTED]',
      nested: { password: '[REDACTED]', ok: 1 },
    });
  });
});

describe('createProdFormat', () => {
  it('should fill sessionId from the active log context', () => {
    const format = createProdFormat({ getStore: () => ({ sessionId: 'session-7' }) });
    const out = format.transform({ level: 'info', message: 'cycle started' });
    if (typeof out === 'boolean') throw new Error('record was filtered');

    const line = JSON.parse(String(out[Symbol.for('message')]));
    expect(line).toMatchObject({ level: 'info', message: 'cycle started', sessionId: 'session-7' });
  });
});

describe('createLogger', () => {
  it('should attach service, env and instance metadata only', () => {
    const logger = createLogger('meta-check');
    expect(Object.keys(logger.defaultMeta).sort()).toEqual(['env', 'instanceId', 'service']);
    expect(logger.defaultMeta.service).toBe('meta-check');
  });
});
