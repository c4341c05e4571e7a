/**
 * Identity management for chanseal.
 * Handles key generation, fingerprint derivation, and signatures.
 */

import {
  EXCHANGE_PUBLIC_KEY_BYTES,
  EXCHANGE_SECRET_KEY_BYTES,
  SIGNATURE_BYTES,
  SIGNING_PUBLIC_KEY_BYTES,
  SIGNING_SECRET_KEY_BYTES,
} from './constants';
import { decodeKeyField, encodeBase58, toBase64Url } from './encoding';
import { buildOffer, type Offer, type OfferVersion } from './encryption/offer';
import { loadSodium } from './encryption/sodium';
import { CryptoError, ErrorCode, ValidationError, describeError } from './errors';

/**
 * Long-term key material for one local identity.
 */
export interface IdentityKeyPair {
  /** Ed25519 public key (32 bytes) */
  signingPublicKey: Uint8Array;
  /** Ed25519 secret key (64 bytes, seed followed by public key) */
  signingSecretKey: Uint8Array;
  /** X25519 public key (32 bytes) */
  exchangePublicKey: Uint8Array;
  /** X25519 secret key (32 bytes) */
  exchangeSecretKey: Uint8Array;
}

/**
 * Serialized identity data. Only ever written inside a secure store blob.
 */
export interface IdentityData {
  fingerprint: string;
  signing_public_key: string;
  signing_secret_key: string;
  exchange_public_key: string;
  exchange_secret_key: string;
  created_at: string;
}

/**
 * Public information that can be shown to peers.
 */
export interface PublicInfo {
  fingerprint: string;
  signing_public_key: string;
  exchange_public_key: string;
}

/**
 * Generate a fresh signing keypair and an independent exchange keypair.
 */
export async function generateIdentityKeyPair(): Promise<IdentityKeyPair> {
  const sodium = await loadSodium();

  try {
    const signing = sodium.crypto_sign_keypair();
    const exchange = sodium.crypto_box_keypair();

    return {
      signingPublicKey: signing.publicKey,
      signingSecretKey: signing.privateKey,
      exchangePublicKey: exchange.publicKey,
      exchangeSecretKey: exchange.privateKey,
    };
  } catch (error) {
    throw new CryptoError(
      `Failed to generate identity: ${describeError(error)}`,
      ErrorCode.CRYPTO_UNAVAILABLE
    );
  }
}

/**
 * Derive the identity fingerprint from a signing public key.
 * fingerprint = base58(blake2b256(public_key)[:20])
 */
export async function deriveFingerprint(signingPublicKey: Uint8Array): Promise<string> {
  const sodium = await loadSodium();
  const hash = sodium.crypto_generichash(32, signingPublicKey);
  return encodeBase58(hash.slice(0, 20));
}

/**
 * Check lengths and internal consistency of a keypair.
 */
async function assertKeyPair(keys: IdentityKeyPair): Promise<void> {
  const expected: Array<[keyof IdentityKeyPair, number]> = [
    ['signingPublicKey', SIGNING_PUBLIC_KEY_BYTES],
    ['signingSecretKey', SIGNING_SECRET_KEY_BYTES],
    ['exchangePublicKey', EXCHANGE_PUBLIC_KEY_BYTES],
    ['exchangeSecretKey', EXCHANGE_SECRET_KEY_BYTES],
  ];
  for (const [field, length] of expected) {
    if (keys[field].length !== length) {
      throw new ValidationError(`${field} must be ${length} bytes`, ErrorCode.INVALID_KEY_MATERIAL, {
        field,
      });
    }
  }

  const sodium = await loadSodium();
  const embeddedSigningPublic = sodium.crypto_sign_ed25519_sk_to_pk(keys.signingSecretKey);
  const derivedExchangePublic = sodium.crypto_scalarmult_base(keys.exchangeSecretKey);

  if (!sodium.memcmp(embeddedSigningPublic, keys.signingPublicKey)) {
    throw new ValidationError('Signing keys do not belong together', ErrorCode.INVALID_KEY_MATERIAL);
  }
  if (!sodium.memcmp(derivedExchangePublic, keys.exchangePublicKey)) {
    throw new ValidationError('Exchange keys do not belong together', ErrorCode.INVALID_KEY_MATERIAL);
  }
}

/**
 * Cryptographic identity of the local party.
 */
export class Identity {
  /** Fingerprint derived from the signing public key */
  readonly fingerprint: string;

  readonly createdAt: Date;

  private readonly keys: IdentityKeyPair;

  private constructor(keys: IdentityKeyPair, fingerprint: string, createdAt: Date) {
    this.keys = keys;
    this.fingerprint = fingerprint;
    this.createdAt = createdAt;
  }

  /**
   * Generate a new cryptographic identity.
   */
  static async generate(): Promise<Identity> {
    const keys = await generateIdentityKeyPair();
    const fingerprint = await deriveFingerprint(keys.signingPublicKey);
    return new Identity(keys, fingerprint, new Date());
  }

  /**
   * Wrap existing key material after validating it.
   */
  static async fromKeyPair(keys: IdentityKeyPair, createdAt: Date = new Date()): Promise<Identity> {
    await assertKeyPair(keys);
    const fingerprint = await deriveFingerprint(keys.signingPublicKey);
    return new Identity(
      {
        signingPublicKey: new Uint8Array(keys.signingPublicKey),
        signingSecretKey: new Uint8Array(keys.signingSecretKey),
        exchangePublicKey: new Uint8Array(keys.exchangePublicKey),
        exchangeSecretKey: new Uint8Array(keys.exchangeSecretKey),
      },
      fingerprint,
      createdAt
    );
  }

  /**
   * Create identity from serialized data.
   */
  static async fromData(data: IdentityData): Promise<Identity> {
    const keys: IdentityKeyPair = {
      signingPublicKey: decodeKeyField(data.signing_public_key, 'signing_public_key', SIGNING_PUBLIC_KEY_BYTES),
      signingSecretKey: decodeKeyField(data.signing_secret_key, 'signing_secret_key', SIGNING_SECRET_KEY_BYTES),
      exchangePublicKey: decodeKeyField(
        data.exchange_public_key,
        'exchange_public_key',
        EXCHANGE_PUBLIC_KEY_BYTES
      ),
      exchangeSecretKey: decodeKeyField(
        data.exchange_secret_key,
        'exchange_secret_key',
        EXCHANGE_SECRET_KEY_BYTES
      ),
    };

    const createdAt = new Date(data.created_at);
    if (Number.isNaN(createdAt.getTime())) {
      throw new ValidationError('Identity has an invalid created_at', ErrorCode.INPUT_FORMAT_ERROR);
    }

    const identity = await Identity.fromKeyPair(keys, createdAt);
    if (identity.fingerprint !== data.fingerprint) {
      throw new ValidationError('Identity fingerprint does not match its keys', ErrorCode.INVALID_KEY_MATERIAL);
    }
    return identity;
  }

  /**
   * Export identity as serializable data.
   */
  toData(): IdentityData {
    return {
      fingerprint: this.fingerprint,
      signing_public_key: toBase64Url(this.keys.signingPublicKey),
      signing_secret_key: toBase64Url(this.keys.signingSecretKey),
      exchange_public_key: toBase64Url(this.keys.exchangePublicKey),
      exchange_secret_key: toBase64Url(this.keys.exchangeSecretKey),
      created_at: this.createdAt.toISOString(),
    };
  }

  toPublicInfo(): PublicInfo {
    return {
      fingerprint: this.fingerprint,
      signing_public_key: toBase64Url(this.keys.signingPublicKey),
      exchange_public_key: toBase64Url(this.keys.exchangePublicKey),
    };
  }

  getSigningPublicKey(): Uint8Array {
    return new Uint8Array(this.keys.signingPublicKey);
  }

  getExchangePublicKey(): Uint8Array {
    return new Uint8Array(this.keys.exchangePublicKey);
  }

  /**
   * Get the exchange secret key (for shared secret derivation).
   */
  getExchangeSecretKey(): Uint8Array {
    return new Uint8Array(this.keys.exchangeSecretKey);
  }

  /**
   * Sign a message with the signing key.
   */
  async sign(message: Uint8Array): Promise<Uint8Array> {
    const sodium = await loadSodium();
    try {
      return sodium.crypto_sign_detached(message, this.keys.signingSecretKey);
    } catch (error) {
      throw new CryptoError(`Failed to sign message: ${describeError(error)}`, ErrorCode.INVALID_KEY_MATERIAL);
    }
  }

  /**
   * Build a key-exchange offer binding our exchange key to our signing key.
   */
  async createOffer(version: OfferVersion): Promise<Offer> {
    return buildOffer(this.keys.signingPublicKey, this.keys.exchangePublicKey, this.keys.signingSecretKey, version);
  }

  /**
   * Verify a detached signature.
   * Malformed key or signature lengths verify as false.
   */
  static async verifySignature(
    publicKey: Uint8Array,
    message: Uint8Array,
    signature: Uint8Array
  ): Promise<boolean> {
    if (publicKey.length !== SIGNING_PUBLIC_KEY_BYTES || signature.length !== SIGNATURE_BYTES) {
      return false;
    }

    const sodium = await loadSodium();
    try {
      return sodium.crypto_sign_verify_detached(signature, message, publicKey);
    } catch {
      return false;
    }
  }
}
