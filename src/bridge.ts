/**
 * HostBridge - the call surface a host (chat client plugin, CLI) talks to.
 *
 * Every operation resolves to an Outcome and never rejects. Failures carry
 * exactly one ErrorCode and are recorded in the audit log.
 *
 * @example
 * ```typescript
 * import { HostBridge } from 'chanseal';
 *
 * const bridge = new HostBridge();
 * await bridge.generateIdentity();
 * const offer = await bridge.createOffer();
 * if (offer.ok) {
 *   sendToPeer(offer.value);
 * }
 * ```
 */

import { AuditLogger, createAuditLogger, type AuditEventOptions, type AuditEventType, type AuditSeverity } from './audit';
import { ChansealConfig } from './config/settings';
import type { ConfigLoader } from './config/file-config';
import { utf8Decode } from './encoding';
import { decrypt, decodeEnvelope, encodeEnvelope, encrypt } from './encryption/aead';
import { channelKeyId, generateChannelKey, openChannelKey, sealChannelKey, type ChannelKey } from './encryption/channel';
import { deriveSharedSecret } from './encryption/exchange';
import { decodeOffer, encodeOffer, type OfferVersion } from './encryption/offer';
import { ErrorCode, ValidationError, describeError, toErrorCode } from './errors';
import { Identity, deriveFingerprint, type PublicInfo } from './identity';
import { Keystore, type PeerRecord } from './keystore';
import { MemoryStorage } from './storage/memory';
import type { Storage } from './storage/interface';
import { ProtectionMode, isProtectionMode, type PlatformProtector } from './store/blob';
import { SecureStore } from './store/secure-store';

export type Success<T> = { ok: true; value: T };
export type Failure = { ok: false; error: ErrorCode };
export type Outcome<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(error: ErrorCode): Failure {
  return { ok: false, error };
}

export interface HostBridgeOptions {
  /** Settings (default: built-in defaults) */
  config?: ChansealConfig;
  /** Backend for the encrypted keystore (default: in-memory) */
  storage?: Storage;
  /** OS protection service for PLATFORM_PROTECT mode */
  platform?: PlatformProtector;
  /** Audit logger (default: memory-only, console per config) */
  auditLogger?: AuditLogger;
  /** Starting keystore (default: empty) */
  keystore?: Keystore;
}

/**
 * Result of accepting a peer offer.
 */
export interface AcceptedPeer {
  peerId: string;
  /** Fingerprint of the peer's signing key, for out-of-band comparison */
  fingerprint: string;
}

export interface DirectMessage {
  peerId: string;
  text: string;
}

export class HostBridge {
  private keystore: Keystore;
  private readonly config: ChansealConfig;
  private readonly store: SecureStore;
  private readonly audit: AuditLogger;

  constructor(options: HostBridgeOptions = {}) {
    this.config = options.config ?? new ChansealConfig();
    this.keystore = options.keystore ?? new Keystore();
    this.audit = options.auditLogger ?? createAuditLogger({ consoleOutput: this.config.auditConsole });
    this.store = new SecureStore({
      storage: options.storage ?? new MemoryStorage(),
      mode: this.config.persistenceMode,
      platform: options.platform,
      storeKey: this.config.storeKey,
    });

    this.audit.setFingerprint(this.keystore.getIdentity()?.fingerprint);
  }

  /**
   * Build a bridge from on-disk settings and the store directory they own.
   */
  static fromConfigLoader(loader: ConfigLoader, options: Omit<HostBridgeOptions, 'config' | 'storage'> = {}): HostBridge {
    return new HostBridge({
      ...options,
      config: loader.loadConfig(),
      storage: loader.createStorage(),
    });
  }

  getKeystore(): Keystore {
    return this.keystore;
  }

  getAuditLogger(): AuditLogger {
    return this.audit;
  }

  getConfig(): ChansealConfig {
    return this.config;
  }

  // Identity and offers

  async generateIdentity(): Promise<Outcome<PublicInfo>> {
    try {
      const identity = await Identity.generate();
      this.keystore.setIdentity(identity);
      this.audit.setFingerprint(identity.fingerprint);
      await this.record('IDENTITY_CREATED', 'INFO', 'Generated local identity');
      return ok(identity.toPublicInfo());
    } catch (error) {
      return this.failure(error, 'ERROR', 'Identity generation failed');
    }
  }

  /**
   * Produce a signed offer as wire text.
   */
  async createOffer(version?: OfferVersion): Promise<Outcome<string>> {
    try {
      const identity = this.requireIdentity();
      const offer = await identity.createOffer(version ?? this.config.defaultOfferVersion);
      await this.record('OFFER_CREATED', 'INFO', `Created v${offer.version} offer`);
      return ok(encodeOffer(offer));
    } catch (error) {
      return this.failure(error, 'ERROR', 'Offer creation failed');
    }
  }

  /**
   * Verify a peer's offer and remember the shared secret under `peerId`.
   */
  async acceptOffer(peerId: string, offerText: string): Promise<Outcome<AcceptedPeer>> {
    try {
      requireName(peerId, 'peerId');
      const identity = this.requireIdentity();
      const offer = decodeOffer(offerText);
      const secret = await deriveSharedSecret(offer, identity.getExchangeSecretKey(), peerId);

      this.keystore.setPeer({
        peerId,
        secret,
        signingPublicKey: offer.signingPublicKey,
        exchangePublicKey: offer.exchangePublicKey,
        establishedAt: new Date(),
      });

      const fingerprint = await deriveFingerprint(offer.signingPublicKey);
      await this.record('OFFER_ACCEPTED', 'INFO', `Accepted v${offer.version} offer`, {
        peerId,
        metadata: { peerFingerprint: fingerprint },
      });
      return ok({ peerId, fingerprint });
    } catch (error) {
      return this.failure(error, 'OFFER_REJECTED', 'Offer rejected', { peerId });
    }
  }

  // Direct messages

  async encryptDirect(peerId: string, text: string): Promise<Outcome<string>> {
    try {
      const identity = this.requireIdentity();
      const peer = this.requirePeer(peerId);
      const envelope = await encrypt(peer.secret.key, text, identity.getExchangePublicKey(), {
        maxPlaintextBytes: this.config.maxPlaintextBytes,
      });
      await this.record('MESSAGE_SEALED', 'DEBUG', 'Sealed direct message', { peerId });
      return ok(encodeEnvelope(envelope));
    } catch (error) {
      return this.failure(error, 'ERROR', 'Direct encryption failed', { peerId });
    }
  }

  /**
   * Open a direct envelope. Without a peerId the sender is found by the
   * exchange key carried in the envelope.
   */
  async decryptDirect(peerId: string | undefined, envelopeText: string): Promise<Outcome<DirectMessage>> {
    try {
      const envelope = decodeEnvelope(envelopeText);
      if (envelope.kind !== 'direct') {
        throw new ValidationError('Expected a direct envelope', ErrorCode.INPUT_FORMAT_ERROR);
      }

      const peer = peerId === undefined ? this.keystore.findPeerByExchangeKey(envelope.from) : this.keystore.getPeer(peerId);
      if (!peer) {
        throw new ValidationError('No shared secret for sender', ErrorCode.INVALID_KEY_MATERIAL, { peerId });
      }

      const text = utf8Decode(await decrypt(peer.secret.key, envelope.nonce, envelope.ciphertext));
      await this.record('MESSAGE_OPENED', 'DEBUG', 'Opened direct message', { peerId: peer.peerId });
      return ok({ peerId: peer.peerId, text });
    } catch (error) {
      return this.failure(error, 'MESSAGE_REJECTED', 'Direct message rejected', withPeer(peerId));
    }
  }

  // Channel keys

  /**
   * Create and keep a fresh key for a channel, replacing any previous one.
   */
  async createChannelKey(channel: string, network: string): Promise<Outcome<string>> {
    try {
      const channelKey = await generateChannelKey(channel, network);
      this.keystore.setChannelKey(channelKey);
      const channelId = channelKeyId(channel, network);
      await this.record('CHANNEL_KEY_CREATED', 'INFO', 'Created channel key', { channelId });
      return ok(channelId);
    } catch (error) {
      return this.failure(error, 'ERROR', 'Channel key creation failed');
    }
  }

  /**
   * Seal a channel key for one peer as a direct envelope.
   */
  async shareChannelKey(peerId: string, channel: string, network: string): Promise<Outcome<string>> {
    const channelId = channelKeyId(channel, network);
    try {
      const identity = this.requireIdentity();
      const peer = this.requirePeer(peerId);
      const channelKey = this.requireChannelKey(channel, network);

      const envelope = await sealChannelKey(channelKey, peer.secret, identity.getExchangePublicKey());
      await this.record('CHANNEL_KEY_SHARED', 'INFO', 'Shared channel key', { peerId, channelId });
      return ok(encodeEnvelope(envelope));
    } catch (error) {
      return this.failure(error, 'ERROR', 'Channel key sharing failed', { peerId, channelId });
    }
  }

  /**
   * Open a channel key received from a peer and keep it.
   */
  async acceptChannelKey(peerId: string, envelopeText: string): Promise<Outcome<string>> {
    try {
      const peer = this.requirePeer(peerId);
      const channelKey = await openChannelKey(decodeEnvelope(envelopeText), peer.secret);
      this.keystore.setChannelKey(channelKey);

      const channelId = channelKeyId(channelKey.channel, channelKey.network);
      await this.record('CHANNEL_KEY_RECEIVED', 'INFO', 'Received channel key', { peerId, channelId });
      return ok(channelId);
    } catch (error) {
      return this.failure(error, 'MESSAGE_REJECTED', 'Channel key rejected', { peerId });
    }
  }

  // Channel messages

  async encryptChannel(channel: string, network: string, text: string): Promise<Outcome<string>> {
    const channelId = channelKeyId(channel, network);
    try {
      const channelKey = this.requireChannelKey(channel, network);
      const envelope = await encrypt(channelKey.key, text, undefined, {
        maxPlaintextBytes: this.config.maxPlaintextBytes,
      });
      await this.record('MESSAGE_SEALED', 'DEBUG', 'Sealed channel message', { channelId });
      return ok(encodeEnvelope(envelope));
    } catch (error) {
      return this.failure(error, 'ERROR', 'Channel encryption failed', { channelId });
    }
  }

  async decryptChannel(channel: string, network: string, envelopeText: string): Promise<Outcome<string>> {
    const channelId = channelKeyId(channel, network);
    try {
      const envelope = decodeEnvelope(envelopeText);
      if (envelope.kind !== 'channel') {
        throw new ValidationError('Expected a channel envelope', ErrorCode.INPUT_FORMAT_ERROR);
      }
      const channelKey = this.requireChannelKey(channel, network);

      const text = utf8Decode(await decrypt(channelKey.key, envelope.nonce, envelope.ciphertext));
      await this.record('MESSAGE_OPENED', 'DEBUG', 'Opened channel message', { channelId });
      return ok(text);
    } catch (error) {
      return this.failure(error, 'MESSAGE_REJECTED', 'Channel message rejected', { channelId });
    }
  }

  // Channel enablement

  async enableChannel(channel: string, network: string): Promise<Outcome<void>> {
    try {
      this.keystore.enableChannel(channel, network);
      await this.record('CHANNEL_ENABLED', 'INFO', 'Enabled channel encryption', {
        channelId: channelKeyId(channel, network),
      });
      return ok(undefined);
    } catch (error) {
      return this.failure(error, 'ERROR', 'Enabling channel failed');
    }
  }

  async disableChannel(channel: string, network: string): Promise<Outcome<void>> {
    try {
      this.keystore.disableChannel(channel, network);
      await this.record('CHANNEL_DISABLED', 'INFO', 'Disabled channel encryption', {
        channelId: channelKeyId(channel, network),
      });
      return ok(undefined);
    } catch (error) {
      return this.failure(error, 'ERROR', 'Disabling channel failed');
    }
  }

  isChannelEnabled(channel: string, network: string): boolean {
    return this.keystore.isChannelEnabled(channel, network);
  }

  // Persistence

  /**
   * Switch the protection mode used by the next save.
   */
  async setPersistenceMode(mode: string): Promise<Outcome<ProtectionMode>> {
    try {
      if (!isProtectionMode(mode)) {
        throw new ValidationError(`Unknown persistence mode: ${mode}`, ErrorCode.INPUT_FORMAT_ERROR);
      }
      this.store.setMode(mode);
      await this.record('PERSISTENCE_MODE_CHANGED', 'INFO', `Persistence mode set to ${mode}`);
      return ok(mode);
    } catch (error) {
      return this.failure(error, 'ERROR', 'Changing persistence mode failed');
    }
  }

  getPersistenceMode(): ProtectionMode {
    return this.store.getMode();
  }

  async save(password?: string): Promise<Outcome<void>> {
    try {
      await this.store.save(this.keystore, password);
      await this.record('STORE_SAVED', 'INFO', `Saved keystore (${this.store.getMode()})`);
      return ok(undefined);
    } catch (error) {
      return this.failure(error, 'STORE_FAILED', 'Saving keystore failed');
    }
  }

  /**
   * Replace the in-memory keystore with the stored one.
   * @returns false when nothing has been saved yet
   */
  async load(password?: string): Promise<Outcome<boolean>> {
    try {
      const loaded = await this.store.load(password);
      if (loaded === null) {
        return ok(false);
      }

      this.keystore = loaded;
      const identity = loaded.getIdentity();
      this.audit.setFingerprint(identity?.fingerprint);
      await this.record('STORE_LOADED', 'INFO', 'Loaded keystore', {
        metadata: { peers: loaded.listPeers().length, channels: loaded.listChannels().length },
      });
      if (identity) {
        await this.record('IDENTITY_LOADED', 'INFO', 'Loaded local identity');
      }
      return ok(true);
    } catch (error) {
      return this.failure(error, 'STORE_FAILED', 'Loading keystore failed');
    }
  }

  // Helpers

  private requireIdentity(): Identity {
    const identity = this.keystore.getIdentity();
    if (!identity) {
      throw new ValidationError('No local identity', ErrorCode.INVALID_KEY_MATERIAL);
    }
    return identity;
  }

  private requirePeer(peerId: string): PeerRecord {
    const peer = this.keystore.getPeer(peerId);
    if (!peer) {
      throw new ValidationError(`No shared secret for peer ${peerId}`, ErrorCode.INVALID_KEY_MATERIAL, { peerId });
    }
    return peer;
  }

  private requireChannelKey(channel: string, network: string): ChannelKey {
    const channelKey = this.keystore.getChannelKey(channel, network);
    if (!channelKey) {
      throw new ValidationError(`No key for channel ${channelKeyId(channel, network)}`, ErrorCode.INVALID_KEY_MATERIAL);
    }
    return channelKey;
  }

  private async failure(
    error: unknown,
    type: AuditEventType,
    context: string,
    options: AuditEventOptions = {}
  ): Promise<Failure> {
    const code = toErrorCode(error);
    await this.record(type, 'ERROR', `${context}: ${describeError(error)}`, { ...options, code });
    return fail(code);
  }

  /**
   * Audit writes never change an operation's outcome.
   */
  private async record(
    type: AuditEventType,
    severity: AuditSeverity,
    message: string,
    options: AuditEventOptions = {}
  ): Promise<void> {
    try {
      await this.audit.log(type, severity, message, options);
    } catch (logError) {
      console.warn(`Failed to record audit event: ${describeError(logError)}`);
    }
  }
}

function requireName(value: string, field: string): void {
  if (value.length === 0) {
    throw new ValidationError(`${field} must not be empty`, ErrorCode.INPUT_FORMAT_ERROR, { field });
  }
}

function withPeer(peerId: string | undefined): AuditEventOptions {
  return peerId === undefined ? {} : { peerId };
}
