import { createHash } from 'node:crypto';

/**
 * sha256 hex digest of a JSON-serializable payload
 */
export function payloadDigest(payload: unknown): string {
  return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
}
