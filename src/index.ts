/**
 * chanseal - end-to-end encryption for text chat channels and direct messages
 *
 * Identities sign key-exchange offers, peers derive a shared secret from
 * them, and every message travels as a sealed envelope. Channel keys are
 * distributed inside direct envelopes. Key material at rest is protected
 * by a password or by an OS protection service.
 *
 * @example
 * ```typescript
 * import { HostBridge } from 'chanseal';
 *
 * const alice = new HostBridge();
 * const bob = new HostBridge();
 * await alice.generateIdentity();
 * await bob.generateIdentity();
 *
 * const aliceOffer = await alice.createOffer();
 * const bobOffer = await bob.createOffer();
 * if (aliceOffer.ok && bobOffer.ok) {
 *   await alice.acceptOffer('bob', bobOffer.value);
 *   await bob.acceptOffer('alice', aliceOffer.value);
 * }
 *
 * const sealed = await alice.encryptDirect('bob', 'hello');
 * ```
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// Host boundary
export { HostBridge, ok, fail } from './bridge';
export type { Outcome, Success, Failure, HostBridgeOptions, AcceptedPeer, DirectMessage } from './bridge';

// Core Identity
export { Identity, generateIdentityKeyPair, deriveFingerprint } from './identity';
export type { IdentityKeyPair, IdentityData, PublicInfo } from './identity';

// Session state
export { Keystore, KEYSTORE_DATA_VERSION } from './keystore';
export type { PeerRecord, PeerRecordData, ChannelKeyData, KeystoreData } from './keystore';

// Encryption
export {
  loadSodium,
  randomBytes,
  buildOffer,
  offerSignedMessage,
  serializeOffer,
  deserializeOffer,
  encodeOffer,
  decodeOffer,
  isOfferVersion,
  SUPPORTED_OFFER_VERSIONS,
  deriveSharedSecret,
  verifyOffer,
  x25519DH,
  encrypt,
  decrypt,
  openEnvelope,
  serializeEnvelope,
  deserializeEnvelope,
  encodeEnvelope,
  decodeEnvelope,
  generateChannelKey,
  packageForDistribution,
  unpackDistribution,
  sealChannelKey,
  openChannelKey,
  channelKeyId,
  assertChannelAddress,
} from './encryption/index';
export type {
  Sodium,
  Offer,
  OfferVersion,
  OfferWire,
  LegacyOffer,
  DirectOffer,
  SharedSecret,
  Envelope,
  DirectEnvelope,
  ChannelEnvelope,
  EnvelopeWire,
  DirectEnvelopeWire,
  ChannelEnvelopeWire,
  EncryptOptions,
  ChannelKey,
  ChannelKeyDescriptor,
} from './encryption/index';

// Secure store
export {
  ProtectionMode,
  isProtectionMode,
  encryptBlob,
  decryptBlob,
  derivePasswordKey,
  SecureStore,
} from './store/index';
export type { PlatformProtector, BlobOptions, SecureStoreOptions } from './store/index';

// Storage
export { MemoryStorage, FileStorage, StorageNamespace } from './storage/index';
export type { Storage } from './storage/index';

// Config
export { ChansealConfig, DEFAULT_MAX_PLAINTEXT_BYTES, ConfigLoader, ConfigError, createConfigLoader } from './config';
export type { ChansealConfigOptions, ConfigLoaderOptions } from './config';

// Audit
export { AuditLogger, createAuditLogger } from './audit';
export type {
  AuditEvent,
  AuditEventType,
  AuditSeverity,
  AuditEventOptions,
  AuditQueryOptions,
  AuditLoggerConfig,
} from './audit';

// Errors
export {
  ErrorCode,
  ChansealError,
  CryptoError,
  ValidationError,
  StorageError,
  toErrorCode,
  describeError,
} from './errors';

// Encoding
export { toBase64Url, fromBase64Url } from './encoding';
