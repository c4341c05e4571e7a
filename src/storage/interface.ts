/**
 * Abstract storage interface for chanseal.
 * Backends hold opaque bytes; encryption happens before a value gets here.
 */
export interface Storage {
  /**
   * Get a value by key.
   * @returns The value, or null if not found
   */
  get(key: string): Promise<Uint8Array | null>;

  /**
   * Set a value by key, replacing any previous value.
   */
  set(key: string, value: Uint8Array): Promise<void>;

  /**
   * Delete a value by key. Deleting a missing key is not an error.
   */
  delete(key: string): Promise<void>;

  /**
   * List keys with a given prefix, sorted.
   */
  list(prefix: string): Promise<string[]>;

  exists(key: string): Promise<boolean>;
}

/**
 * Storage key namespace prefixes.
 */
export const StorageNamespace = {
  KEYSTORE: 'keystore/',
  AUDIT: 'audit/',
} as const;

/**
 * Utility to create namespaced storage keys.
 */
export function namespacedKey(namespace: string, key: string): string {
  return `${namespace}${key}`;
}

/**
 * Utility to strip namespace from a key.
 */
export function stripNamespace(namespace: string, key: string): string {
  if (key.startsWith(namespace)) {
    return key.slice(namespace.length);
  }
  return key;
}
