/**
 * Signed key-exchange offers.
 *
 * An offer binds an X25519 exchange key to an Ed25519 identity key. Two
 * signing conventions exist and the explicit version field selects one:
 * - version 1 (legacy / channel bootstrap) signs `idPub || encPub`
 * - version 2 (direct messages) signs `encPub` alone
 */

import {
  EXCHANGE_PUBLIC_KEY_BYTES,
  SIGNATURE_BYTES,
  SIGNING_PUBLIC_KEY_BYTES,
  SIGNING_SECRET_KEY_BYTES,
} from '../constants';
import {
  concatBytes,
  decodeKeyField,
  parseJsonObject,
  requireInteger,
  requireString,
  toBase64Url,
} from '../encoding';
import { CryptoError, ErrorCode, ValidationError, describeError } from '../errors';
import { loadSodium } from './sodium';

export type OfferVersion = 1 | 2;

export const SUPPORTED_OFFER_VERSIONS: readonly OfferVersion[] = [1, 2];

interface OfferFields {
  readonly signingPublicKey: Uint8Array;
  readonly exchangePublicKey: Uint8Array;
  readonly signature: Uint8Array;
}

/** Offer whose signature covers `signingPublicKey || exchangePublicKey`. */
export interface LegacyOffer extends OfferFields {
  readonly version: 1;
}

/** Offer whose signature covers `exchangePublicKey` only. */
export interface DirectOffer extends OfferFields {
  readonly version: 2;
}

export type Offer = LegacyOffer | DirectOffer;

/**
 * Wire form of an offer.
 */
export type OfferWire = {
  v: number;
  idPub: string;
  encPub: string;
  sig: string;
};

export function isOfferVersion(value: number): value is OfferVersion {
  return value === 1 || value === 2;
}

/**
 * Select the bytes covered by the signature for a given offer version.
 */
export function offerSignedMessage(
  version: OfferVersion,
  signingPublicKey: Uint8Array,
  exchangePublicKey: Uint8Array
): Uint8Array {
  switch (version) {
    case 1:
      return concatBytes(signingPublicKey, exchangePublicKey);
    case 2:
      return new Uint8Array(exchangePublicKey);
  }
}

function assertLength(bytes: Uint8Array, length: number, field: string): void {
  if (bytes.length !== length) {
    throw new ValidationError(`${field} must be ${length} bytes, got ${bytes.length}`, ErrorCode.INVALID_KEY_MATERIAL, {
      field,
    });
  }
}

function makeOffer(version: OfferVersion, fields: OfferFields): Offer {
  const offer: Offer = version === 1 ? { version: 1, ...fields } : { version: 2, ...fields };
  return Object.freeze(offer);
}

/**
 * Build a signed offer over our exchange public key.
 */
export async function buildOffer(
  signingPublicKey: Uint8Array,
  exchangePublicKey: Uint8Array,
  signingSecretKey: Uint8Array,
  version: OfferVersion
): Promise<Offer> {
  if (!isOfferVersion(version)) {
    throw new ValidationError(`Unsupported offer version: ${String(version)}`, ErrorCode.INPUT_FORMAT_ERROR);
  }
  assertLength(signingPublicKey, SIGNING_PUBLIC_KEY_BYTES, 'signingPublicKey');
  assertLength(exchangePublicKey, EXCHANGE_PUBLIC_KEY_BYTES, 'exchangePublicKey');
  assertLength(signingSecretKey, SIGNING_SECRET_KEY_BYTES, 'signingSecretKey');

  const sodium = await loadSodium();
  const message = offerSignedMessage(version, signingPublicKey, exchangePublicKey);

  let signature: Uint8Array;
  try {
    signature = sodium.crypto_sign_detached(message, signingSecretKey);
  } catch (error) {
    throw new CryptoError(`Failed to sign offer: ${describeError(error)}`, ErrorCode.INVALID_KEY_MATERIAL);
  }

  return makeOffer(version, {
    signingPublicKey: new Uint8Array(signingPublicKey),
    exchangePublicKey: new Uint8Array(exchangePublicKey),
    signature,
  });
}

/**
 * Serialize an offer for wire transport.
 */
export function serializeOffer(offer: Offer): OfferWire {
  return {
    v: offer.version,
    idPub: toBase64Url(offer.signingPublicKey),
    encPub: toBase64Url(offer.exchangePublicKey),
    sig: toBase64Url(offer.signature),
  };
}

/**
 * Deserialize an offer from its parsed wire form.
 * The signature is not checked here; derivation verifies it.
 */
export function deserializeOffer(wire: Record<string, unknown>): Offer {
  const version = requireInteger(wire, 'v', 'Offer');
  if (!isOfferVersion(version)) {
    throw new ValidationError(`Unsupported offer version: ${version}`, ErrorCode.INPUT_FORMAT_ERROR);
  }

  return makeOffer(version, {
    signingPublicKey: decodeKeyField(requireString(wire, 'idPub', 'Offer'), 'idPub', SIGNING_PUBLIC_KEY_BYTES),
    exchangePublicKey: decodeKeyField(requireString(wire, 'encPub', 'Offer'), 'encPub', EXCHANGE_PUBLIC_KEY_BYTES),
    signature: decodeKeyField(requireString(wire, 'sig', 'Offer'), 'sig', SIGNATURE_BYTES),
  });
}

export function encodeOffer(offer: Offer): string {
  return JSON.stringify(serializeOffer(offer));
}

export function decodeOffer(text: string): Offer {
  return deserializeOffer(parseJsonObject(text, 'Offer'));
}
