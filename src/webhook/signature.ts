import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'X-Telex-Signature';

export function signPayload(rawBody: string, secret: string): string {
  return createHmac('sha256', secret).update(rawBody, 'utf8').digest('hex');
}

/**
 * Check a lowercase-hex HMAC-SHA256 of the raw body. Returns true when no
 * secret is configured.
 */
export function verifySignature(rawBody: string, signature: string | undefined, secret: string): boolean {
  if (!secret) return true;
  if (!signature) return false;

  const expected = Buffer.from(signPayload(rawBody, secret), 'utf8');
  const given = Buffer.from(signature.trim(), 'utf8');
  if (given.length !== expected.length) return false;
  return timingSafeEqual(given, expected);
}
