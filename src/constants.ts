/**
 * Key, nonce and protocol sizes shared across modules.
 */

export const SIGNING_PUBLIC_KEY_BYTES = 32;
export const SIGNING_SECRET_KEY_BYTES = 64;
export const SIGNATURE_BYTES = 64;
export const EXCHANGE_PUBLIC_KEY_BYTES = 32;
export const EXCHANGE_SECRET_KEY_BYTES = 32;

/** Symmetric key size for shared secrets, channel keys and store keys. */
export const SYMMETRIC_KEY_BYTES = 32;

/** XChaCha20-Poly1305 nonce size. */
export const NONCE_BYTES = 24;

/** Poly1305 tag size. */
export const TAG_BYTES = 16;

/** Argon2id salt size. */
export const SALT_BYTES = 16;

/** Envelope protocol versions. */
export const DIRECT_ENVELOPE_VERSION = 2;
export const CHANNEL_ENVELOPE_VERSION = 1;
export const CHANNEL_KEY_DESCRIPTOR_VERSION = 1;
