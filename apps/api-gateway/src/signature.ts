// apps/api-gateway/src/signature.ts
import crypto from 'crypto';

const PREFIX = 'sha256=';

export function signPayload(secret: string, raw: Buffer | string): string {
  return PREFIX + crypto.createHmac('sha256', secret).update(raw).digest('hex');
}

/**
 * Checks a webhook signature header against the raw request bytes.
 * Accepts the bare hex digest or the "sha256=<hex>" form GitHub sends.
 */
export function verifySignature(secret: string, raw: Buffer | undefined, header: string | undefined): boolean {
  if (!secret || !raw || !header) return false;

  const received = header.startsWith(PREFIX) ? header.slice(PREFIX.length) : header;
  if (!/^[0-9a-f]{64}$/i.test(received)) return false;

  // MUST hash the *raw* bytes, never a re-serialized body
  const expected = crypto.createHmac('sha256', secret).update(raw).digest();
  const a = Buffer.from(received, 'hex');
  if (a.length !== expected.length) return false;

  return crypto.timingSafeEqual(a, expected);
}
