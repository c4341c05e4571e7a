/**
 * File-based configuration loader for chanseal.
 * Reads settings from ~/.chanseal/config.json and owns the store directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { asRecord } from '../encoding';
import { ChansealError, ErrorCode, describeError } from '../errors';
import { FileStorage } from '../storage/file';
import { ChansealConfig, type ChansealConfigOptions } from './settings';

/**
 * Configuration error.
 */
export class ConfigError extends ChansealError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.INPUT_FORMAT_ERROR);
    this.name = 'ConfigError';
    this.cause = cause;
  }
}

export interface ConfigLoaderOptions {
  /** Base directory (default: ~/.chanseal or CHANSEAL_HOME) */
  baseDir?: string;
  /** Fall back to defaults instead of throwing on unreadable config */
  gracefulFallback?: boolean;
}

/**
 * Loads and saves settings, and locates the encrypted store on disk.
 */
export class ConfigLoader {
  private readonly baseDir: string;
  private readonly storeDir: string;
  private readonly configPath: string;
  private readonly gracefulFallback: boolean;
  private currentConfig: ChansealConfig | null = null;

  constructor(options: ConfigLoaderOptions = {}) {
    this.baseDir = options.baseDir ?? this.resolveBaseDir();
    this.storeDir = path.join(this.baseDir, 'store');
    this.configPath = path.join(this.baseDir, 'config.json');
    this.gracefulFallback = options.gracefulFallback ?? false;

    this.ensureDirectories();
  }

  private resolveBaseDir(): string {
    if (process.env.CHANSEAL_HOME) {
      return process.env.CHANSEAL_HOME;
    }
    return path.join(os.homedir(), '.chanseal');
  }

  /**
   * Create the base and store directories, owner-only.
   */
  private ensureDirectories(): void {
    try {
      for (const dir of [this.baseDir, this.storeDir]) {
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
        }
      }
    } catch (error) {
      if (!this.gracefulFallback) {
        throw new ConfigError('Failed to create chanseal directories', error);
      }
      console.warn(`Failed to create chanseal directories: ${describeError(error)}`);
    }
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  getStoreDir(): string {
    return this.storeDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load settings. A missing file yields the defaults.
   */
  loadConfig(configPath?: string): ChansealConfig {
    const filePath = configPath ?? this.configPath;

    try {
      if (!fs.existsSync(filePath)) {
        this.currentConfig = new ChansealConfig();
        return this.currentConfig;
      }

      const content = fs.readFileSync(filePath, 'utf-8');
      this.currentConfig = ChansealConfig.fromJSON(asRecord(JSON.parse(content), 'Config'));
      return this.currentConfig;
    } catch (error) {
      if (this.gracefulFallback) {
        console.warn(`Failed to load config, using defaults: ${describeError(error)}`);
        this.currentConfig = new ChansealConfig();
        return this.currentConfig;
      }
      if (error instanceof SyntaxError) {
        throw new ConfigError(`Invalid JSON in config file: ${filePath}`, error);
      }
      throw new ConfigError(`Failed to load config from ${filePath}: ${describeError(error)}`, error);
    }
  }

  saveConfig(options: ChansealConfigOptions, configPath?: string): void {
    const filePath = configPath ?? this.configPath;
    // Validate before writing
    const config = new ChansealConfig(options);

    try {
      fs.writeFileSync(filePath, JSON.stringify(config.toJSON(), null, 2), { mode: 0o600 });
    } catch (error) {
      throw new ConfigError(`Failed to save config to ${filePath}`, error);
    }
  }

  getConfig(): ChansealConfig | null {
    return this.currentConfig;
  }

  /**
   * File-backed storage rooted at the store directory.
   */
  createStorage(): FileStorage {
    return new FileStorage(this.storeDir);
  }
}

export function createConfigLoader(options?: ConfigLoaderOptions): ConfigLoader {
  return new ConfigLoader(options);
}
