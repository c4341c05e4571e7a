/**
 * Encrypted Messaging Example
 *
 * Two parties exchange offers, send a direct message, then share a
 * channel key and talk on the channel.
 */

import { HostBridge, type Outcome } from '../src/index';

function unwrap<T>(label: string, outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new Error(`${label} failed: ${outcome.error}`);
  }
  return outcome.value;
}

async function main() {
  console.log('=== Encrypted Messaging Demo ===\n');

  const alice = new HostBridge();
  const bob = new HostBridge();

  const aliceInfo = unwrap('alice identity', await alice.generateIdentity());
  const bobInfo = unwrap('bob identity', await bob.generateIdentity());
  console.log('Alice:', aliceInfo.fingerprint);
  console.log('Bob:  ', bobInfo.fingerprint);
  console.log();

  // Offers are plain text and can travel over any chat transport
  const aliceOffer = unwrap('alice offer', await alice.createOffer());
  const bobOffer = unwrap('bob offer', await bob.createOffer());
  console.log('Alice offer:', aliceOffer.substring(0, 60) + '...');

  const accepted = unwrap('accept bob', await alice.acceptOffer('bob', bobOffer));
  unwrap('accept alice', await bob.acceptOffer('alice', aliceOffer));
  console.log('Alice sees Bob as', accepted.fingerprint, '(compare out of band)');
  console.log();

  console.log('=== Direct Message ===\n');

  const sealed = unwrap('encrypt', await alice.encryptDirect('bob', 'Hello, Bob!'));
  console.log('On the wire:', sealed);

  const opened = unwrap('decrypt', await bob.decryptDirect(undefined, sealed));
  console.log(`Bob read from ${opened.peerId}:`, opened.text);
  console.log();

  console.log('=== Channel ===\n');

  unwrap('channel key', await alice.createChannelKey('#team', 'example.net'));
  const keyEnvelope = unwrap('share', await alice.shareChannelKey('bob', '#team', 'example.net'));
  const channelId = unwrap('accept key', await bob.acceptChannelKey('alice', keyEnvelope));
  console.log('Bob received key for', channelId);

  const post = unwrap('post', await bob.encryptChannel('#team', 'example.net', 'standup in 5'));
  console.log('Alice read:', unwrap('read', await alice.decryptChannel('#team', 'example.net', post)));

  // Tampering is detected before any plaintext is released
  const tampered = post.replace('"cipher":"', '"cipher":"AAAA');
  const rejected = await alice.decryptChannel('#team', 'example.net', tampered);
  console.log('Tampered post:', rejected.ok ? 'accepted' : rejected.error);
}

main().catch(console.error);
