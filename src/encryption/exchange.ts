/**
 * Shared secret derivation from a signed offer.
 *
 * SharedSecret = BLAKE2b-256(X25519(ourExchangeSecret, offer.exchangePublicKey))
 *
 * The offer signature is checked first; a forged or substituted exchange key
 * never reaches the Diffie-Hellman step.
 */

import { EXCHANGE_PUBLIC_KEY_BYTES, EXCHANGE_SECRET_KEY_BYTES, SYMMETRIC_KEY_BYTES } from '../constants';
import { CryptoError, ErrorCode, ValidationError, describeError } from '../errors';
import { Identity } from '../identity';
import { offerSignedMessage, type Offer } from './offer';
import { loadSodium } from './sodium';

/**
 * Symmetric key shared with a peer (direct) or with no peer (group bootstrap).
 */
export interface SharedSecret {
  readonly key: Uint8Array;
  readonly peerId?: string;
}

/**
 * Check the offer signature against its embedded signing key.
 */
export async function verifyOffer(offer: Offer): Promise<boolean> {
  const message = offerSignedMessage(offer.version, offer.signingPublicKey, offer.exchangePublicKey);
  return Identity.verifySignature(offer.signingPublicKey, message, offer.signature);
}

/**
 * Raw X25519. Rejects peer keys that produce an all-zero output.
 */
export async function x25519DH(secretKey: Uint8Array, publicKey: Uint8Array): Promise<Uint8Array> {
  if (secretKey.length !== EXCHANGE_SECRET_KEY_BYTES) {
    throw new ValidationError('Exchange secret key must be 32 bytes', ErrorCode.INVALID_KEY_MATERIAL);
  }
  if (publicKey.length !== EXCHANGE_PUBLIC_KEY_BYTES) {
    throw new ValidationError('Exchange public key must be 32 bytes', ErrorCode.INVALID_KEY_MATERIAL);
  }

  const sodium = await loadSodium();
  try {
    return sodium.crypto_scalarmult(secretKey, publicKey);
  } catch (error) {
    throw new CryptoError(`Key exchange rejected peer key: ${describeError(error)}`, ErrorCode.KEY_EXCHANGE_FAILED);
  }
}

/**
 * Verify an offer and derive the shared secret with its sender.
 */
export async function deriveSharedSecret(
  offer: Offer,
  localExchangeSecret: Uint8Array,
  peerId?: string
): Promise<SharedSecret> {
  if (!(await verifyOffer(offer))) {
    throw new CryptoError('Offer signature is invalid', ErrorCode.SIGNATURE_INVALID);
  }

  const raw = await x25519DH(localExchangeSecret, offer.exchangePublicKey);

  const sodium = await loadSodium();
  const key = sodium.crypto_generichash(SYMMETRIC_KEY_BYTES, raw);
  sodium.memzero(raw);

  return peerId === undefined ? { key } : { key, peerId };
}
