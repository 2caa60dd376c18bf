import { createHmac, timingSafeEqual } from 'node:crypto';

const SIGNATURE_PREFIX = 'sha256=';

/** GitHub-style `X-Hub-Signature-256` value for a body. */
export function signPayload(secret: string, body: Buffer | string): string {
  return SIGNATURE_PREFIX + createHmac('sha256', secret).update(body).digest('hex');
}

/** Constant-time check of a `sha256=<hex>` signature over the raw body. */
export function verifySignature(
  secret: string,
  body: Buffer | string,
  signature: string | undefined,
): boolean {
  if (!signature) return false;
  const expected = Buffer.from(signPayload(secret, body));
  const received = Buffer.from(signature);
  if (expected.length !== received.length) return false;
  return timingSafeEqual(expected, received);
}
