/**
 * Message envelopes sealed with XChaCha20-Poly1305.
 *
 * Every call to `encrypt` draws a fresh 24-byte nonce from the CSPRNG. The
 * Poly1305 tag (16 bytes) is appended to the ciphertext and checked before
 * any plaintext is released.
 */

import {
  CHANNEL_ENVELOPE_VERSION,
  DIRECT_ENVELOPE_VERSION,
  EXCHANGE_PUBLIC_KEY_BYTES,
  NONCE_BYTES,
  SYMMETRIC_KEY_BYTES,
  TAG_BYTES,
} from '../constants';
import {
  decodeKeyField,
  fromBase64Url,
  parseJsonObject,
  requireInteger,
  requireString,
  toBase64Url,
  utf8Encode,
} from '../encoding';
import { CryptoError, ErrorCode, ValidationError } from '../errors';
import { loadSodium } from './sodium';

/**
 * Envelope for a direct message. Carries the sender exchange key so the
 * recipient can pick the peer context.
 */
export interface DirectEnvelope {
  readonly kind: 'direct';
  readonly version: number;
  readonly from: Uint8Array;
  readonly nonce: Uint8Array;
  readonly ciphertext: Uint8Array;
}

/**
 * Envelope for a channel message sealed under a channel key.
 */
export interface ChannelEnvelope {
  readonly kind: 'channel';
  readonly version: number;
  readonly nonce: Uint8Array;
  readonly ciphertext: Uint8Array;
}

export type Envelope = DirectEnvelope | ChannelEnvelope;

export type DirectEnvelopeWire = {
  v: number;
  from: string;
  nonce: string;
  cipher: string;
};

export type ChannelEnvelopeWire = {
  v: number;
  nonce: string;
  cipher: string;
};

export type EnvelopeWire = DirectEnvelopeWire | ChannelEnvelopeWire;

export interface EncryptOptions {
  /** Reject plaintexts longer than this many bytes */
  maxPlaintextBytes?: number;
}

function assertKey(key: Uint8Array): void {
  if (key.length !== SYMMETRIC_KEY_BYTES) {
    throw new ValidationError(`Symmetric key must be ${SYMMETRIC_KEY_BYTES} bytes`, ErrorCode.INVALID_KEY_MATERIAL);
  }
}

/**
 * Seal a plaintext. With a sender exchange key the result is a direct
 * envelope, without one a channel envelope.
 */
export async function encrypt(
  key: Uint8Array,
  plaintext: Uint8Array | string,
  senderExchangePublic: Uint8Array,
  options?: EncryptOptions
): Promise<DirectEnvelope>;
export async function encrypt(
  key: Uint8Array,
  plaintext: Uint8Array | string,
  senderExchangePublic?: undefined,
  options?: EncryptOptions
): Promise<ChannelEnvelope>;
export async function encrypt(
  key: Uint8Array,
  plaintext: Uint8Array | string,
  senderExchangePublic?: Uint8Array,
  options: EncryptOptions = {}
): Promise<Envelope> {
  assertKey(key);
  if (senderExchangePublic !== undefined && senderExchangePublic.length !== EXCHANGE_PUBLIC_KEY_BYTES) {
    throw new ValidationError('Sender exchange key must be 32 bytes', ErrorCode.INVALID_KEY_MATERIAL);
  }

  const message = typeof plaintext === 'string' ? utf8Encode(plaintext) : plaintext;
  if (options.maxPlaintextBytes !== undefined && message.length > options.maxPlaintextBytes) {
    throw new ValidationError(
      `Plaintext of ${message.length} bytes exceeds limit of ${options.maxPlaintextBytes}`,
      ErrorCode.PAYLOAD_TOO_LARGE
    );
  }

  const sodium = await loadSodium();
  const nonce = sodium.randombytes_buf(NONCE_BYTES);
  const ciphertext = sodium.crypto_aead_xchacha20poly1305_ietf_encrypt(message, null, null, nonce, key);

  if (senderExchangePublic === undefined) {
    return { kind: 'channel', version: CHANNEL_ENVELOPE_VERSION, nonce, ciphertext };
  }
  return {
    kind: 'direct',
    version: DIRECT_ENVELOPE_VERSION,
    from: new Uint8Array(senderExchangePublic),
    nonce,
    ciphertext,
  };
}

/**
 * Open and authenticate a ciphertext. Nothing is returned unless the tag verifies.
 */
export async function decrypt(key: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array): Promise<Uint8Array> {
  assertKey(key);
  if (nonce.length !== NONCE_BYTES) {
    throw new ValidationError(`Nonce must be ${NONCE_BYTES} bytes`, ErrorCode.INPUT_FORMAT_ERROR);
  }

  const sodium = await loadSodium();
  try {
    return sodium.crypto_aead_xchacha20poly1305_ietf_decrypt(null, ciphertext, null, nonce, key);
  } catch {
    throw new CryptoError('Message authentication failed', ErrorCode.AUTHENTICATION_FAILED);
  }
}

export async function openEnvelope(key: Uint8Array, envelope: Envelope): Promise<Uint8Array> {
  return decrypt(key, envelope.nonce, envelope.ciphertext);
}

/**
 * Serialize an envelope for wire transport.
 */
export function serializeEnvelope(envelope: DirectEnvelope): DirectEnvelopeWire;
export function serializeEnvelope(envelope: ChannelEnvelope): ChannelEnvelopeWire;
export function serializeEnvelope(envelope: Envelope): EnvelopeWire;
export function serializeEnvelope(envelope: Envelope): EnvelopeWire {
  if (envelope.kind === 'direct') {
    return {
      v: envelope.version,
      from: toBase64Url(envelope.from),
      nonce: toBase64Url(envelope.nonce),
      cipher: toBase64Url(envelope.ciphertext),
    };
  }
  return {
    v: envelope.version,
    nonce: toBase64Url(envelope.nonce),
    cipher: toBase64Url(envelope.ciphertext),
  };
}

/**
 * Deserialize an envelope. The presence of `from` selects a direct envelope.
 */
export function deserializeEnvelope(wire: Record<string, unknown>): Envelope {
  const version = requireInteger(wire, 'v', 'Envelope');
  const nonce = decodeKeyField(requireString(wire, 'nonce', 'Envelope'), 'nonce', NONCE_BYTES, ErrorCode.INPUT_FORMAT_ERROR);
  const ciphertext = fromBase64Url(requireString(wire, 'cipher', 'Envelope'), 'cipher');
  if (ciphertext.length < TAG_BYTES) {
    throw new ValidationError('Envelope ciphertext is shorter than its tag', ErrorCode.INPUT_FORMAT_ERROR);
  }

  if (wire['from'] === undefined) {
    if (version !== CHANNEL_ENVELOPE_VERSION) {
      throw new ValidationError(`Unsupported channel envelope version: ${version}`, ErrorCode.INPUT_FORMAT_ERROR);
    }
    return { kind: 'channel', version, nonce, ciphertext };
  }

  if (version !== DIRECT_ENVELOPE_VERSION) {
    throw new ValidationError(`Unsupported direct envelope version: ${version}`, ErrorCode.INPUT_FORMAT_ERROR);
  }
  const from = decodeKeyField(requireString(wire, 'from', 'Envelope'), 'from', EXCHANGE_PUBLIC_KEY_BYTES);
  return { kind: 'direct', version, from, nonce, ciphertext };
}

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(serializeEnvelope(envelope));
}

export function decodeEnvelope(text: string): Envelope {
  return deserializeEnvelope(parseJsonObject(text, 'Envelope'));
}
