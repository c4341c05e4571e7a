/**
 * Channel (group) keys.
 *
 * One symmetric key is shared by every member of a channel. Keys travel to
 * new members only inside a direct envelope sealed under the shared secret
 * with that member; a descriptor is never sent on its own.
 */

import { CHANNEL_KEY_DESCRIPTOR_VERSION, SYMMETRIC_KEY_BYTES } from '../constants';
import {
  decodeKeyField,
  parseJsonObject,
  requireInteger,
  requireString,
  toBase64Url,
  utf8Decode,
} from '../encoding';
import { ErrorCode, ValidationError } from '../errors';
import { encrypt, openEnvelope, type DirectEnvelope, type Envelope, type EncryptOptions } from './aead';
import type { SharedSecret } from './exchange';
import { loadSodium } from './sodium';

export interface ChannelKey {
  readonly key: Uint8Array;
  readonly channel: string;
  readonly network: string;
  readonly createdAt: Date;
}

/**
 * Transport form of a channel key. Always sealed before it leaves the process.
 */
export type ChannelKeyDescriptor = {
  v: number;
  channel: string;
  network: string;
  key: string;
  createdAt: string;
};

function assertIdentifier(value: string, field: string): void {
  if (value.length === 0) {
    throw new ValidationError(`Channel key ${field} must not be empty`, ErrorCode.INPUT_FORMAT_ERROR, { field });
  }
}

/**
 * Check a channel address before it is filed. The network may not contain
 * `/`, so every `network/channel` id splits one way only.
 */
export function assertChannelAddress(channel: string, network: string): void {
  assertIdentifier(channel, 'channel');
  assertIdentifier(network, 'network');
  if (network.includes('/')) {
    throw new ValidationError('Channel key network must not contain "/"', ErrorCode.INPUT_FORMAT_ERROR, {
      field: 'network',
    });
  }
}

/**
 * Key under which a channel key is filed: `network/channel`.
 * Channel names are case-insensitive on the networks this serves.
 */
export function channelKeyId(channel: string, network: string): string {
  return `${network.toLowerCase()}/${channel.toLowerCase()}`;
}

/**
 * Generate a fresh channel key.
 */
export async function generateChannelKey(channel: string, network: string, now: Date = new Date()): Promise<ChannelKey> {
  assertChannelAddress(channel, network);

  const sodium = await loadSodium();
  return {
    key: sodium.randombytes_buf(SYMMETRIC_KEY_BYTES),
    channel,
    network,
    createdAt: new Date(now.getTime()),
  };
}

export function packageForDistribution(channelKey: ChannelKey): ChannelKeyDescriptor {
  return {
    v: CHANNEL_KEY_DESCRIPTOR_VERSION,
    channel: channelKey.channel,
    network: channelKey.network,
    key: toBase64Url(channelKey.key),
    createdAt: channelKey.createdAt.toISOString(),
  };
}

/**
 * Validate a descriptor and rebuild the channel key it carries.
 */
export function unpackDistribution(descriptor: Record<string, unknown>): ChannelKey {
  const version = requireInteger(descriptor, 'v', 'Channel key descriptor');
  if (version !== CHANNEL_KEY_DESCRIPTOR_VERSION) {
    throw new ValidationError(`Unsupported channel key descriptor version: ${version}`, ErrorCode.INPUT_FORMAT_ERROR);
  }

  const channel = requireString(descriptor, 'channel', 'Channel key descriptor');
  const network = requireString(descriptor, 'network', 'Channel key descriptor');
  assertChannelAddress(channel, network);

  const createdAt = new Date(requireString(descriptor, 'createdAt', 'Channel key descriptor'));
  if (Number.isNaN(createdAt.getTime())) {
    throw new ValidationError('Channel key descriptor has an invalid createdAt', ErrorCode.INPUT_FORMAT_ERROR);
  }

  return {
    key: decodeKeyField(requireString(descriptor, 'key', 'Channel key descriptor'), 'key', SYMMETRIC_KEY_BYTES),
    channel,
    network,
    createdAt,
  };
}

/**
 * Seal a channel key for one recipient over an established direct secret.
 */
export async function sealChannelKey(
  channelKey: ChannelKey,
  sharedSecret: SharedSecret,
  senderExchangePublic: Uint8Array,
  options?: EncryptOptions
): Promise<DirectEnvelope> {
  const descriptor = JSON.stringify(packageForDistribution(channelKey));
  return encrypt(sharedSecret.key, descriptor, senderExchangePublic, options);
}

/**
 * Open a sealed channel key. Only direct envelopes are accepted.
 */
export async function openChannelKey(envelope: Envelope, sharedSecret: SharedSecret): Promise<ChannelKey> {
  if (envelope.kind !== 'direct') {
    throw new ValidationError('Channel keys are only accepted inside direct envelopes', ErrorCode.INPUT_FORMAT_ERROR);
  }

  const plaintext = await openEnvelope(sharedSecret.key, envelope);
  return unpackDistribution(parseJsonObject(utf8Decode(plaintext), 'Channel key descriptor'));
}
