import { describe, it, expect } from '@jest/globals';
import { redact, signPayload, verifySignature } from '../shared/redact.js';

describe('redact', () => {
  it('masks bearer tokens and authorization headers', () => {
    expect(redact('calling with Bearer test-token-value')).toBe('calling with [REDACTED]');
    expect(redact('authorization: test-token-value')).toBe('[REDACTED]');
  });

  it('masks GitHub token shapes', () => {
    expect(redact(`token is ghp_${'x'.repeat(36)} here`)).toBe('token is [REDACTED] here');
  });

  it('leaves ordinary text alone', () => {
    expect(redact('3 passed, 0 failed')).toBe('3 passed, 0 failed');
  });
});

describe('webhook signatures', () => {
  it('accepts a signature made with the same secret', () => {
    const body = '{"ref":"refs/heads/main"}';
    expect(verifySignature(body, 'test-secret', signPayload(body, 'test-secret'))).toBe(true);
  });

  it('rejects a signature made with another secret, for another body, or missing', () => {
    const body = '{"ref":"refs/heads/main"}';
    expect(verifySignature(body, 'test-secret', signPayload(body, 'other-secret'))).toBe(false);
    expect(verifySignature(body, 'test-secret', signPayload('{}', 'test-secret'))).toBe(false);
    expect(verifySignature(body, 'test-secret', undefined)).toBe(false);
    expect(verifySignature(body, 'test-secret', 'sha256=short')).toBe(false);
  });

  it('uses the sha256= prefix', () => {
    expect(signPayload('x', 'test-secret')).toMatch(/^sha256=[0-9a-f]{64}$/);
  });
});
