import { ecb } from '@noble/ciphers/aes.js';
import { DecryptionError } from '../errors/index.js';

/**
 * AES-128-ECB decrypt with PKCS#7 unpadding.
 *
 * @throws {DecryptionError} when the ciphertext is not block aligned or the
 *   padding does not check out.
 */
export function aes128EcbDecrypt(data: Uint8Array, key: Uint8Array): Uint8Array {
  if (key.length !== 16) throw new DecryptionError(`AES-128 key must be 16 bytes, got ${key.length}`);
  try {
    return ecb(key).decrypt(data);
  } catch (err) {
    throw new DecryptionError(
      `AES-ECB decryption failed: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}
