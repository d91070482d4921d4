import { randomBytes } from 'crypto';

/**
 * Generate a random 64-bit nonce (16 lowercase hex characters)
 */
export function generateNonce(): string {
  return randomBytes(8).toString('hex');
}
