import * as fs from 'fs/promises';
import * as os from 'os';
import * as nodePath from 'path';
import type { Storage } from './interface';
import { ErrorCode, StorageError } from '../errors';

/**
 * Get the default chanseal home directory.
 * Uses CHANSEAL_HOME environment variable or ~/.chanseal/
 */
export function getDefaultChansealPath(): string {
  if (process.env.CHANSEAL_HOME) {
    return process.env.CHANSEAL_HOME;
  }
  return nodePath.join(os.homedir(), '.chanseal');
}

/**
 * Create a FileStorage instance under the default chanseal home.
 */
export function createDefaultFileStorage(): FileStorage {
  return new FileStorage(nodePath.join(getDefaultChansealPath(), 'store'));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Filesystem-backed storage. Each key is one file under the base path.
 *
 * Writes go to a temporary file that is renamed into place, so a reader never
 * sees a half-written blob. There is no locking: callers serialize access to
 * the same base path.
 */
export class FileStorage implements Storage {
  private readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  private resolvePath(key: string): string {
    // Sanitize key to prevent path traversal
    const sanitized = key.replace(/\.\./g, '_').replace(/^\/+/, '');
    return nodePath.join(this.basePath, sanitized);
  }

  async get(key: string): Promise<Uint8Array | null> {
    try {
      const data = await fs.readFile(this.resolvePath(key));
      return new Uint8Array(data);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StorageError(`Failed to read ${key}`, ErrorCode.DECRYPTION_FAILED);
    }
  }

  async set(key: string, value: Uint8Array): Promise<void> {
    const filePath = this.resolvePath(key);
    const tempPath = `${filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(nodePath.dirname(filePath), { recursive: true, mode: 0o700 });
      // Restrictive permissions: the value may be key material
      await fs.writeFile(tempPath, value, { mode: 0o600 });
      await fs.rename(tempPath, filePath);
    } catch {
      await fs.rm(tempPath, { force: true });
      throw new StorageError(`Failed to write ${key}`, ErrorCode.PERSISTENCE_DISABLED);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await fs.unlink(this.resolvePath(key));
    } catch (error) {
      if (!isNotFound(error)) {
        throw new StorageError(`Failed to delete ${key}`, ErrorCode.PERSISTENCE_DISABLED);
      }
    }
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.resolvePath(prefix);
    const prefixDir = prefix.endsWith('/') ? prefixPath : nodePath.dirname(prefixPath);
    const prefixBase = prefix.endsWith('/') ? '' : nodePath.basename(prefixPath);
    const keyDir = prefix.substring(0, prefix.lastIndexOf('/') + 1);

    try {
      const entries = await fs.readdir(prefixDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name.startsWith(prefixBase) && !entry.name.endsWith('.tmp'))
        .map((entry) => `${keyDir}${entry.name}`)
        .sort();
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new StorageError(`Failed to list ${prefix}`, ErrorCode.DECRYPTION_FAILED);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.resolvePath(key));
      return true;
    } catch {
      return false;
    }
  }
}
