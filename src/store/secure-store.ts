/**
 * Encrypted-at-rest persistence of the keystore.
 */

import { utf8Decode, utf8Encode } from '../encoding';
import { ChansealError, ErrorCode, StorageError, describeError } from '../errors';
import { Keystore } from '../keystore';
import type { Storage } from '../storage/interface';
import { StorageNamespace, namespacedKey } from '../storage/interface';
import { ProtectionMode, decryptBlob, encryptBlob, type PlatformProtector } from './blob';

export interface SecureStoreOptions {
  /** Backend that holds the encrypted token */
  storage: Storage;
  /** Initial protection mode (default: password) */
  mode?: ProtectionMode;
  /** Platform protection service, required for PLATFORM_PROTECT */
  platform?: PlatformProtector;
  /** Name of the stored keystore (default: 'default') */
  storeKey?: string;
}

/**
 * Saves and loads a Keystore under one protection mode.
 *
 * Changing the mode affects the next save only; an existing blob keeps the
 * mode it was written with until it is saved again. Concurrent saves and
 * loads against the same backend must be serialized by the caller.
 */
export class SecureStore {
  private mode: ProtectionMode;
  private readonly storage: Storage;
  private readonly platform?: PlatformProtector;
  private readonly key: string;

  constructor(options: SecureStoreOptions) {
    this.storage = options.storage;
    this.mode = options.mode ?? ProtectionMode.PASSWORD;
    this.platform = options.platform;
    this.key = namespacedKey(StorageNamespace.KEYSTORE, options.storeKey ?? 'default');
  }

  getMode(): ProtectionMode {
    return this.mode;
  }

  setMode(mode: ProtectionMode): void {
    this.mode = mode;
  }

  /**
   * Encrypt arbitrary bytes under the current mode.
   */
  async seal(plaintext: Uint8Array, password?: string): Promise<string> {
    return encryptBlob(this.mode, plaintext, { password, platform: this.platform });
  }

  /**
   * Decrypt a token written under the current mode.
   */
  async open(token: string, password?: string): Promise<Uint8Array> {
    return decryptBlob(this.mode, token, { password, platform: this.platform });
  }

  async save(keystore: Keystore, password?: string): Promise<void> {
    const token = await this.seal(utf8Encode(keystore.serialize()), password);
    await backendCall('write', ErrorCode.PERSISTENCE_DISABLED, () => this.storage.set(this.key, utf8Encode(token)));
  }

  /**
   * Load the stored keystore.
   * @returns null when nothing has been saved yet
   */
  async load(password?: string): Promise<Keystore | null> {
    if (this.mode === ProtectionMode.NONE) {
      throw new StorageError('Persistence is disabled', ErrorCode.PERSISTENCE_DISABLED);
    }

    const stored = await backendCall('read', ErrorCode.DECRYPTION_FAILED, () => this.storage.get(this.key));
    if (stored === null) {
      return null;
    }

    let token: string;
    try {
      token = utf8Decode(stored);
    } catch {
      throw new StorageError('Stored keystore is not a text token', ErrorCode.DECRYPTION_FAILED);
    }

    const plaintext = await this.open(token, password);
    try {
      return await Keystore.deserialize(utf8Decode(plaintext));
    } catch {
      throw new StorageError('Stored keystore is malformed', ErrorCode.DECRYPTION_FAILED);
    }
  }

  async exists(): Promise<boolean> {
    return backendCall('read', ErrorCode.DECRYPTION_FAILED, () => this.storage.exists(this.key));
  }

  async clear(): Promise<void> {
    await backendCall('delete', ErrorCode.PERSISTENCE_DISABLED, () => this.storage.delete(this.key));
  }
}

/**
 * Run a storage backend call, reporting foreign errors under a store code.
 */
async function backendCall<T>(action: string, code: ErrorCode, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof ChansealError) {
      throw error;
    }
    throw new StorageError(`Keystore ${action} failed: ${describeError(error)}`, code);
  }
}
