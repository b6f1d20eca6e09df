import { describe, it, expect } from 'vitest';
import { createHmac } from 'node:crypto';
import { signPayload, verifySignature } from '../../src/webhook/signature.js';

const body = '{"event_id":"evt-1","event_type":"user.joined"}';

describe('webhook signature', () => {
  it('should produce lowercase hex HMAC-SHA256', () => {
    const expected = createHmac('sha256', 'test-secret').update(body).digest('hex');
    expect(signPayload(body, 'test-secret')).toBe(expected);
    expect(expected).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should accept a matching signature', () => {
    expect(verifySignature(body, signPayload(body, 'test-secret'), 'test-secret')).toBe(true);
  });

  it('should reject a signature made with another secret', () => {
    expect(verifySignature(body, signPayload(body, 'other-secret'), 'test-secret')).toBe(false);
  });

  it('should reject a signature over a different body', () => {
    expect(verifySignature(body + ' ', signPayload(body, 'test-secret'), 'test-secret')).toBe(false);
  });

  it('should reject a missing or truncated signature', () => {
    expect(verifySignature(body, undefined, 'test-secret')).toBe(false);
    expect(verifySignature(body, signPayload(body, 'test-secret').slice(0, 10), 'test-secret')).toBe(false);
  });

  it('should skip the check when no secret is configured', () => {
    expect(verifySignature(body, undefined, '')).toBe(true);
    expect(verifySignature(body, 'garbage', '')).toBe(true);
  });
});
