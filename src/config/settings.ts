/**
 * Runtime settings for chanseal.
 */

import { isOfferVersion, type OfferVersion } from '../encryption/offer';
import { ErrorCode, ValidationError } from '../errors';
import { ProtectionMode, isProtectionMode } from '../store/blob';

/**
 * Settings as written in config.json.
 */
export interface ChansealConfigOptions {
  /** Persistence protection mode (default: password) */
  persistenceMode?: ProtectionMode;
  /** Largest plaintext accepted for sealing, in bytes (default: 4096) */
  maxPlaintextBytes?: number;
  /** Offer version produced when the host does not ask for one (default: 2) */
  defaultOfferVersion?: OfferVersion;
  /** Name of the stored keystore (default: 'default') */
  storeKey?: string;
  /** Mirror audit events to the console (default: false) */
  auditConsole?: boolean;
}

export const DEFAULT_MAX_PLAINTEXT_BYTES = 4096;

/**
 * Validated settings with defaults applied.
 */
export class ChansealConfig {
  readonly persistenceMode: ProtectionMode;
  readonly maxPlaintextBytes: number;
  readonly defaultOfferVersion: OfferVersion;
  readonly storeKey: string;
  readonly auditConsole: boolean;

  constructor(options: ChansealConfigOptions = {}) {
    this.persistenceMode = options.persistenceMode ?? ProtectionMode.PASSWORD;
    this.maxPlaintextBytes = options.maxPlaintextBytes ?? DEFAULT_MAX_PLAINTEXT_BYTES;
    this.defaultOfferVersion = options.defaultOfferVersion ?? 2;
    this.storeKey = options.storeKey ?? 'default';
    this.auditConsole = options.auditConsole ?? false;

    if (!Number.isInteger(this.maxPlaintextBytes) || this.maxPlaintextBytes <= 0) {
      throw new ValidationError('maxPlaintextBytes must be a positive integer', ErrorCode.INPUT_FORMAT_ERROR);
    }
    if (!/^[A-Za-z0-9_-]+$/.test(this.storeKey)) {
      throw new ValidationError('storeKey may only contain letters, digits, _ and -', ErrorCode.INPUT_FORMAT_ERROR);
    }
  }

  /**
   * Build settings from untrusted parsed JSON.
   */
  static fromJSON(data: Record<string, unknown>): ChansealConfig {
    const options: ChansealConfigOptions = {};

    const mode = data['persistenceMode'];
    if (mode !== undefined) {
      if (typeof mode !== 'string' || !isProtectionMode(mode)) {
        throw new ValidationError(`Unknown persistenceMode: ${String(mode)}`, ErrorCode.INPUT_FORMAT_ERROR);
      }
      options.persistenceMode = mode;
    }

    const maxPlaintextBytes = data['maxPlaintextBytes'];
    if (maxPlaintextBytes !== undefined) {
      if (typeof maxPlaintextBytes !== 'number') {
        throw new ValidationError('maxPlaintextBytes must be a number', ErrorCode.INPUT_FORMAT_ERROR);
      }
      options.maxPlaintextBytes = maxPlaintextBytes;
    }

    const version = data['defaultOfferVersion'];
    if (version !== undefined) {
      if (typeof version !== 'number' || !isOfferVersion(version)) {
        throw new ValidationError(`Unsupported defaultOfferVersion: ${String(version)}`, ErrorCode.INPUT_FORMAT_ERROR);
      }
      options.defaultOfferVersion = version;
    }

    const storeKey = data['storeKey'];
    if (storeKey !== undefined) {
      if (typeof storeKey !== 'string') {
        throw new ValidationError('storeKey must be a string', ErrorCode.INPUT_FORMAT_ERROR);
      }
      options.storeKey = storeKey;
    }

    const auditConsole = data['auditConsole'];
    if (auditConsole !== undefined) {
      if (typeof auditConsole !== 'boolean') {
        throw new ValidationError('auditConsole must be a boolean', ErrorCode.INPUT_FORMAT_ERROR);
      }
      options.auditConsole = auditConsole;
    }

    return new ChansealConfig(options);
  }

  toJSON(): Required<ChansealConfigOptions> {
    return {
      persistenceMode: this.persistenceMode,
      maxPlaintextBytes: this.maxPlaintextBytes,
      defaultOfferVersion: this.defaultOfferVersion,
      storeKey: this.storeKey,
      auditConsole: this.auditConsole,
    };
  }
}
