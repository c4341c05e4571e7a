/**
 * Lazy libsodium initialization.
 * The wasm module must finish loading before any primitive is called.
 */

import _sodium from 'libsodium-wrappers-sumo';
import { CryptoError, ErrorCode, describeError } from '../errors';

export type Sodium = typeof _sodium;

let sodiumReady: Promise<Sodium> | null = null;

/**
 * Resolve the initialized libsodium instance.
 * A failed initialization is not cached, so a later call retries the load.
 */
export async function loadSodium(): Promise<Sodium> {
  if (!sodiumReady) {
    sodiumReady = _sodium.ready.then(() => _sodium);
  }

  try {
    return await sodiumReady;
  } catch (error) {
    sodiumReady = null;
    throw new CryptoError(
      `Failed to initialize libsodium: ${describeError(error)}`,
      ErrorCode.CRYPTO_UNAVAILABLE
    );
  }
}

/**
 * Draw `length` bytes from the libsodium CSPRNG.
 */
export async function randomBytes(length: number): Promise<Uint8Array> {
  const sodium = await loadSodium();
  return sodium.randombytes_buf(length);
}
