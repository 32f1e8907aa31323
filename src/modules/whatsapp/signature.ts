import { createHmac, timingSafeEqual } from 'node:crypto';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * Check the X-Hub-Signature-256 header Meta sends with every webhook delivery
 * against an HMAC-SHA256 of the raw request body.
 */
export const isValidSignature = (
  rawBody: string,
  signatureHeader: string | undefined,
  appSecret: string
): boolean => {
  if (!signatureHeader || !signatureHeader.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const received = Buffer.from(signatureHeader.slice(SIGNATURE_PREFIX.length), 'hex');
  const expected = createHmac('sha256', appSecret).update(rawBody, 'utf8').digest();

  return received.length === expected.length && timingSafeEqual(received, expected);
};
