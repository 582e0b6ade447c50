import { createHash } from 'node:crypto';

/**
 * Hex SHA-256 digest of a string (UTF-8) or raw bytes.
 */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}
