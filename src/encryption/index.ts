/**
 * Encryption module for chanseal.
 * Offers, shared secret derivation, sealed envelopes and channel keys.
 */

export { loadSodium, randomBytes, type Sodium } from './sodium';

// Signed key-exchange offers
export {
  buildOffer,
  offerSignedMessage,
  serializeOffer,
  deserializeOffer,
  encodeOffer,
  decodeOffer,
  isOfferVersion,
  SUPPORTED_OFFER_VERSIONS,
  type Offer,
  type OfferVersion,
  type OfferWire,
  type LegacyOffer,
  type DirectOffer,
} from './offer';

// Shared secret derivation
export { deriveSharedSecret, verifyOffer, x25519DH, type SharedSecret } from './exchange';

// Envelopes
export {
  encrypt,
  decrypt,
  openEnvelope,
  serializeEnvelope,
  deserializeEnvelope,
  encodeEnvelope,
  decodeEnvelope,
  type Envelope,
  type DirectEnvelope,
  type ChannelEnvelope,
  type EnvelopeWire,
  type DirectEnvelopeWire,
  type ChannelEnvelopeWire,
  type EncryptOptions,
} from './aead';

// Channel keys
export {
  generateChannelKey,
  packageForDistribution,
  unpackDistribution,
  sealChannelKey,
  openChannelKey,
  channelKeyId,
  assertChannelAddress,
  type ChannelKey,
  type ChannelKeyDescriptor,
} from './channel';
