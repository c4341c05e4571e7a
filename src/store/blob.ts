/**
 * At-rest protection of serialized key material.
 *
 * Blob layout, base64url encoded as a single token:
 *   password: 0x02 || salt(16) || nonce(24) || ciphertext+tag
 *   platform: 0x01 || platform-protected bytes
 *
 * Any failure to open a blob is reported as DECRYPTION_FAILED; no partial
 * plaintext is ever returned.
 */

import { NONCE_BYTES, SALT_BYTES, SYMMETRIC_KEY_BYTES, TAG_BYTES } from '../constants';
import { concatBytes, fromBase64Url, toBase64Url } from '../encoding';
import { decrypt, encrypt } from '../encryption/aead';
import { loadSodium } from '../encryption/sodium';
import { ChansealError, CryptoError, ErrorCode, StorageError, ValidationError, describeError } from '../errors';

/**
 * Persistence protection modes.
 */
export enum ProtectionMode {
  /** Persistence disabled */
  NONE = 'none',
  /** Delegated to an OS per-user protection service */
  PLATFORM_PROTECT = 'platform',
  /** Argon2id key derived from a user password */
  PASSWORD = 'password',
}

const MODE_TAG = {
  [ProtectionMode.PLATFORM_PROTECT]: 0x01,
  [ProtectionMode.PASSWORD]: 0x02,
} as const;

export function isProtectionMode(value: string): value is ProtectionMode {
  return value === ProtectionMode.NONE || value === ProtectionMode.PLATFORM_PROTECT || value === ProtectionMode.PASSWORD;
}

/**
 * OS-provided protection bound to the current user account.
 * The host supplies an implementation; none is built in.
 */
export interface PlatformProtector {
  protect(data: Uint8Array): Promise<Uint8Array>;
  unprotect(data: Uint8Array): Promise<Uint8Array>;
}

export interface BlobOptions {
  /** Required for PASSWORD mode */
  password?: string;
  /** Required for PLATFORM_PROTECT mode */
  platform?: PlatformProtector;
}

/**
 * Derive the store key from a password with Argon2id (interactive limits).
 */
export async function derivePasswordKey(password: string, salt: Uint8Array): Promise<Uint8Array> {
  const sodium = await loadSodium();
  if (salt.length !== SALT_BYTES) {
    throw new ValidationError(`Salt must be ${SALT_BYTES} bytes`, ErrorCode.KDF_ERROR);
  }

  try {
    return sodium.crypto_pwhash(
      SYMMETRIC_KEY_BYTES,
      password,
      salt,
      sodium.crypto_pwhash_OPSLIMIT_INTERACTIVE,
      sodium.crypto_pwhash_MEMLIMIT_INTERACTIVE,
      sodium.crypto_pwhash_ALG_ARGON2ID13
    );
  } catch (error) {
    throw new CryptoError(`Password key derivation failed: ${describeError(error)}`, ErrorCode.KDF_ERROR);
  }
}

function requirePlatform(options: BlobOptions): PlatformProtector {
  if (!options.platform) {
    throw new StorageError('Platform protection service is not available', ErrorCode.PLATFORM_SERVICE_UNAVAILABLE);
  }
  return options.platform;
}

/**
 * Protect plaintext under the given mode and return a single text token.
 */
export async function encryptBlob(
  mode: ProtectionMode,
  plaintext: Uint8Array,
  options: BlobOptions = {}
): Promise<string> {
  switch (mode) {
    case ProtectionMode.NONE:
      throw new StorageError('Persistence is disabled', ErrorCode.PERSISTENCE_DISABLED);

    case ProtectionMode.PLATFORM_PROTECT: {
      const platform = requirePlatform(options);
      let protectedBytes: Uint8Array;
      try {
        protectedBytes = await platform.protect(plaintext);
      } catch (error) {
        throw new StorageError(
          `Platform protection failed: ${describeError(error)}`,
          ErrorCode.PLATFORM_SERVICE_UNAVAILABLE
        );
      }
      return toBase64Url(concatBytes(Uint8Array.of(MODE_TAG[mode]), protectedBytes));
    }

    case ProtectionMode.PASSWORD: {
      if (!options.password) {
        throw new ValidationError('Password mode requires a non-empty password', ErrorCode.INPUT_FORMAT_ERROR);
      }
      const sodium = await loadSodium();
      const salt = sodium.randombytes_buf(SALT_BYTES);
      const key = await derivePasswordKey(options.password, salt);
      try {
        const sealed = await encrypt(key, plaintext);
        return toBase64Url(concatBytes(Uint8Array.of(MODE_TAG[mode]), salt, sealed.nonce, sealed.ciphertext));
      } finally {
        sodium.memzero(key);
      }
    }
  }
}

async function openPasswordBlob(body: Uint8Array, password: string | undefined): Promise<Uint8Array> {
  if (!password) {
    throw new StorageError('Password mode requires a password', ErrorCode.DECRYPTION_FAILED);
  }
  if (body.length < SALT_BYTES + NONCE_BYTES + TAG_BYTES) {
    throw new StorageError('Store blob is truncated', ErrorCode.DECRYPTION_FAILED);
  }

  const salt = body.subarray(0, SALT_BYTES);
  const nonce = body.subarray(SALT_BYTES, SALT_BYTES + NONCE_BYTES);
  const ciphertext = body.subarray(SALT_BYTES + NONCE_BYTES);

  const sodium = await loadSodium();
  const key = await derivePasswordKey(password, salt);
  try {
    return await decrypt(key, nonce, ciphertext);
  } finally {
    sodium.memzero(key);
  }
}

/**
 * Open a token produced by `encryptBlob` under the same mode.
 */
export async function decryptBlob(mode: ProtectionMode, token: string, options: BlobOptions = {}): Promise<Uint8Array> {
  if (mode === ProtectionMode.NONE) {
    throw new StorageError('Persistence is disabled', ErrorCode.PERSISTENCE_DISABLED);
  }
  const platform = mode === ProtectionMode.PLATFORM_PROTECT ? requirePlatform(options) : undefined;

  try {
    const raw = fromBase64Url(token.trim(), 'store blob');
    if (raw.length < 1 || raw[0] !== MODE_TAG[mode]) {
      throw new StorageError('Store blob was not written in this mode', ErrorCode.DECRYPTION_FAILED);
    }
    const body = raw.subarray(1);

    if (platform) {
      return await platform.unprotect(body);
    }
    return await openPasswordBlob(body, options.password);
  } catch (error) {
    if (error instanceof ChansealError && error.code === ErrorCode.DECRYPTION_FAILED) {
      throw error;
    }
    throw new StorageError(`Failed to open store blob: ${describeError(error)}`, ErrorCode.DECRYPTION_FAILED);
  }
}
