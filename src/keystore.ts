/**
 * Keystore - the session state a host keeps between calls.
 *
 * Holds the local identity, one shared secret per peer, one key per
 * (network, channel) pair and the set of channels with encryption enabled.
 * It is passed explicitly to every operation that needs it.
 */

import { EXCHANGE_PUBLIC_KEY_BYTES, SIGNING_PUBLIC_KEY_BYTES, SYMMETRIC_KEY_BYTES } from './constants';
import { asRecord, decodeKeyField, parseJsonObject, requireInteger, requireString, toBase64Url } from './encoding';
import { assertChannelAddress, channelKeyId, type ChannelKey } from './encryption/channel';
import type { SharedSecret } from './encryption/exchange';
import { ErrorCode, ValidationError } from './errors';
import { Identity, type IdentityData } from './identity';

export const KEYSTORE_DATA_VERSION = 1;

/**
 * A peer we have completed an offer exchange with.
 */
export interface PeerRecord {
  readonly peerId: string;
  readonly secret: SharedSecret;
  readonly signingPublicKey: Uint8Array;
  readonly exchangePublicKey: Uint8Array;
  readonly establishedAt: Date;
}

export interface PeerRecordData {
  peer_id: string;
  key: string;
  signing_public_key: string;
  exchange_public_key: string;
  established_at: string;
}

export interface ChannelKeyData {
  channel: string;
  network: string;
  key: string;
  created_at: string;
}

export interface KeystoreData {
  version: number;
  identity: IdentityData | null;
  peers: PeerRecordData[];
  channels: ChannelKeyData[];
  enabled_channels: string[];
}

function parseDate(value: string, what: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`${what} has an invalid timestamp`, ErrorCode.INPUT_FORMAT_ERROR);
  }
  return date;
}

function requireObjectArray(obj: Record<string, unknown>, key: string): Record<string, unknown>[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw new ValidationError(`Keystore is missing array field '${key}'`, ErrorCode.INPUT_FORMAT_ERROR);
  }
  return value.map((item: unknown) => asRecord(item, `Keystore ${key} entry`));
}

export class Keystore {
  private identity: Identity | null = null;
  private readonly peers: Map<string, PeerRecord> = new Map();
  private readonly channels: Map<string, ChannelKey> = new Map();
  private readonly enabledChannels: Set<string> = new Set();

  // Identity

  getIdentity(): Identity | null {
    return this.identity;
  }

  setIdentity(identity: Identity): void {
    this.identity = identity;
  }

  // Peers

  setPeer(record: PeerRecord): void {
    this.peers.set(record.peerId, record);
  }

  getPeer(peerId: string): PeerRecord | undefined {
    return this.peers.get(peerId);
  }

  getPeerSecret(peerId: string): SharedSecret | undefined {
    return this.peers.get(peerId)?.secret;
  }

  /**
   * Find the peer whose exchange key sent a direct envelope.
   */
  findPeerByExchangeKey(exchangePublicKey: Uint8Array): PeerRecord | undefined {
    const wanted = toBase64Url(exchangePublicKey);
    for (const record of this.peers.values()) {
      if (toBase64Url(record.exchangePublicKey) === wanted) {
        return record;
      }
    }
    return undefined;
  }

  removePeer(peerId: string): boolean {
    return this.peers.delete(peerId);
  }

  listPeers(): string[] {
    return [...this.peers.keys()].sort();
  }

  // Channel keys

  setChannelKey(channelKey: ChannelKey): void {
    assertChannelAddress(channelKey.channel, channelKey.network);
    this.channels.set(channelKeyId(channelKey.channel, channelKey.network), channelKey);
  }

  getChannelKey(channel: string, network: string): ChannelKey | undefined {
    return this.channels.get(channelKeyId(channel, network));
  }

  removeChannelKey(channel: string, network: string): boolean {
    return this.channels.delete(channelKeyId(channel, network));
  }

  /**
   * List channel key ids as `network/channel`.
   */
  listChannels(): string[] {
    return [...this.channels.keys()].sort();
  }

  // Channel enablement

  enableChannel(channel: string, network: string): void {
    assertChannelAddress(channel, network);
    this.enabledChannels.add(channelKeyId(channel, network));
  }

  disableChannel(channel: string, network: string): void {
    this.enabledChannels.delete(channelKeyId(channel, network));
  }

  isChannelEnabled(channel: string, network: string): boolean {
    return this.enabledChannels.has(channelKeyId(channel, network));
  }

  // Serialization

  toData(): KeystoreData {
    return {
      version: KEYSTORE_DATA_VERSION,
      identity: this.identity ? this.identity.toData() : null,
      peers: [...this.peers.values()].map((record) => ({
        peer_id: record.peerId,
        key: toBase64Url(record.secret.key),
        signing_public_key: toBase64Url(record.signingPublicKey),
        exchange_public_key: toBase64Url(record.exchangePublicKey),
        established_at: record.establishedAt.toISOString(),
      })),
      channels: [...this.channels.values()].map((channelKey) => ({
        channel: channelKey.channel,
        network: channelKey.network,
        key: toBase64Url(channelKey.key),
        created_at: channelKey.createdAt.toISOString(),
      })),
      enabled_channels: [...this.enabledChannels].sort(),
    };
  }

  serialize(): string {
    return JSON.stringify(this.toData());
  }

  /**
   * Rebuild a keystore from its JSON form, validating every field.
   */
  static async deserialize(json: string): Promise<Keystore> {
    const data = parseJsonObject(json, 'Keystore');
    const version = requireInteger(data, 'version', 'Keystore');
    if (version !== KEYSTORE_DATA_VERSION) {
      throw new ValidationError(`Unsupported keystore version: ${version}`, ErrorCode.INPUT_FORMAT_ERROR);
    }

    const keystore = new Keystore();

    const identity = data['identity'];
    if (identity !== null && identity !== undefined) {
      const fields = asRecord(identity, 'Keystore identity');
      keystore.setIdentity(
        await Identity.fromData({
          fingerprint: requireString(fields, 'fingerprint', 'Identity'),
          signing_public_key: requireString(fields, 'signing_public_key', 'Identity'),
          signing_secret_key: requireString(fields, 'signing_secret_key', 'Identity'),
          exchange_public_key: requireString(fields, 'exchange_public_key', 'Identity'),
          exchange_secret_key: requireString(fields, 'exchange_secret_key', 'Identity'),
          created_at: requireString(fields, 'created_at', 'Identity'),
        })
      );
    }

    for (const peer of requireObjectArray(data, 'peers')) {
      const peerId = requireString(peer, 'peer_id', 'Peer');
      keystore.setPeer({
        peerId,
        secret: { key: decodeKeyField(requireString(peer, 'key', 'Peer'), 'key', SYMMETRIC_KEY_BYTES), peerId },
        signingPublicKey: decodeKeyField(
          requireString(peer, 'signing_public_key', 'Peer'),
          'signing_public_key',
          SIGNING_PUBLIC_KEY_BYTES
        ),
        exchangePublicKey: decodeKeyField(
          requireString(peer, 'exchange_public_key', 'Peer'),
          'exchange_public_key',
          EXCHANGE_PUBLIC_KEY_BYTES
        ),
        establishedAt: parseDate(requireString(peer, 'established_at', 'Peer'), 'Peer'),
      });
    }

    for (const channel of requireObjectArray(data, 'channels')) {
      keystore.setChannelKey({
        channel: requireString(channel, 'channel', 'Channel key'),
        network: requireString(channel, 'network', 'Channel key'),
        key: decodeKeyField(requireString(channel, 'key', 'Channel key'), 'key', SYMMETRIC_KEY_BYTES),
        createdAt: parseDate(requireString(channel, 'created_at', 'Channel key'), 'Channel key'),
      });
    }

    const enabled = data['enabled_channels'];
    if (!Array.isArray(enabled)) {
      throw new ValidationError("Keystore is missing array field 'enabled_channels'", ErrorCode.INPUT_FORMAT_ERROR);
    }
    const ids: unknown[] = enabled;
    for (const id of ids) {
      if (typeof id !== 'string' || !id.includes('/')) {
        throw new ValidationError('Keystore has a malformed enabled channel id', ErrorCode.INPUT_FORMAT_ERROR);
      }
      keystore.enabledChannels.add(id);
    }

    return keystore;
  }
}
