import type { Storage } from './interface';

/**
 * In-memory storage for tests and for hosts that persist elsewhere.
 */
export class MemoryStorage implements Storage {
  private store: Map<string, Uint8Array> = new Map();

  async get(key: string): Promise<Uint8Array | null> {
    const value = this.store.get(key);
    return value ? new Uint8Array(value) : null;
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    // Copy to prevent external mutation
    this.store.set(key, new Uint8Array(value));
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.store.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async exists(key: string): Promise<boolean> {
    return this.store.has(key);
  }

  /**
   * Clear all stored values.
   */
  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
