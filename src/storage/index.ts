/**
 * Storage module - pluggable byte stores behind the secure store.
 *
 * @example
 * ```typescript
 * import { MemoryStorage, FileStorage } from 'chanseal/storage';
 *
 * // For testing
 * const memory = new MemoryStorage();
 *
 * // For Node.js hosts
 * const file = new FileStorage('/path/to/data');
 * ```
 */

export type { Storage } from './interface';
export { StorageNamespace, namespacedKey, stripNamespace } from './interface';
export { MemoryStorage } from './memory';
export { FileStorage, getDefaultChansealPath, createDefaultFileStorage } from './file';
