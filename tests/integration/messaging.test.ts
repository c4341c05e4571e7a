/**
 * Integration tests for the full message flow.
 * Offer exchange, direct messages, channel key distribution and
 * persistence of the keystore between sessions.
 */
import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Identity } from '../../src/identity';
import { Keystore } from '../../src/keystore';
import {
  decodeEnvelope,
  decodeOffer,
  deriveSharedSecret,
  encodeEnvelope,
  encodeOffer,
  encrypt,
  generateChannelKey,
  openChannelKey,
  openEnvelope,
  sealChannelKey,
} from '../../src/encryption';
import { HostBridge, type Outcome } from '../../src/bridge';
import { ConfigLoader } from '../../src/config';
import { SecureStore } from '../../src/store/secure-store';
import { MemoryStorage } from '../../src/storage/memory';
import { utf8Decode } from '../../src/encoding';
import { ErrorCode } from '../../src/errors';
import { errorCodeOf } from '../helpers';

function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new Error(`Expected success, got ${outcome.error}`);
  }
  return outcome.value;
}

describe('Messaging Integration', () => {
  let alice: Identity;
  let bob: Identity;

  beforeEach(async () => {
    alice = await Identity.generate();
    bob = await Identity.generate();
  });

  test('should exchange offers and deliver a direct message', async () => {
    // Offers travel as text over the chat transport
    const aliceOfferText = encodeOffer(await alice.createOffer(2));
    const bobOfferText = encodeOffer(await bob.createOffer(2));

    const aliceSecret = await deriveSharedSecret(decodeOffer(bobOfferText), alice.getExchangeSecretKey(), 'bob');
    const bobSecret = await deriveSharedSecret(decodeOffer(aliceOfferText), bob.getExchangeSecretKey(), 'alice');
    expect(aliceSecret.key).toEqual(bobSecret.key);

    const wireText = encodeEnvelope(await encrypt(aliceSecret.key, 'hello', alice.getExchangePublicKey()));

    const received = decodeEnvelope(wireText);
    expect(received.kind).toBe('direct');
    expect(utf8Decode(await openEnvelope(bobSecret.key, received))).toBe('hello');
  });

  test('should distribute a channel key to every member', async () => {
    const carol = await Identity.generate();
    const now = new Date('2026-05-01T12:00:00.000Z');

    // Alice owns the channel and has a direct secret with each member
    const withBob = await deriveSharedSecret(await bob.createOffer(1), alice.getExchangeSecretKey(), 'bob');
    const withCarol = await deriveSharedSecret(await carol.createOffer(1), alice.getExchangeSecretKey(), 'carol');
    const bobWithAlice = await deriveSharedSecret(await alice.createOffer(1), bob.getExchangeSecretKey(), 'alice');
    const carolWithAlice = await deriveSharedSecret(await alice.createOffer(1), carol.getExchangeSecretKey(), 'alice');

    const channelKey = await generateChannelKey('#team', 'example.net', now);
    const forBob = encodeEnvelope(await sealChannelKey(channelKey, withBob, alice.getExchangePublicKey()));
    const forCarol = encodeEnvelope(await sealChannelKey(channelKey, withCarol, alice.getExchangePublicKey()));

    const bobKey = await openChannelKey(decodeEnvelope(forBob), bobWithAlice);
    const carolKey = await openChannelKey(decodeEnvelope(forCarol), carolWithAlice);
    expect(bobKey.key).toEqual(channelKey.key);
    expect(carolKey.createdAt.toISOString()).toBe('2026-05-01T12:00:00.000Z');

    // Bob posts, Carol reads
    const post = encodeEnvelope(await encrypt(bobKey.key, 'standup in 5'));
    expect(utf8Decode(await openEnvelope(carolKey.key, decodeEnvelope(post)))).toBe('standup in 5');

    // A key sealed for Carol does not open for Bob
    expect(await errorCodeOf(openChannelKey(decodeEnvelope(forCarol), bobWithAlice))).toBe(
      ErrorCode.AUTHENTICATION_FAILED
    );
  });

  test('should resume a conversation after reloading the keystore', async () => {
    const storage = new MemoryStorage();
    const store = new SecureStore({ storage });

    const keystore = new Keystore();
    keystore.setIdentity(alice);
    const bobOffer = await bob.createOffer(2);
    keystore.setPeer({
      peerId: 'bob',
      secret: await deriveSharedSecret(bobOffer, alice.getExchangeSecretKey(), 'bob'),
      signingPublicKey: bobOffer.signingPublicKey,
      exchangePublicKey: bobOffer.exchangePublicKey,
      establishedAt: new Date(),
    });
    await store.save(keystore, 'test-password');

    const reloaded = await store.load('test-password');
    const secret = reloaded?.getPeerSecret('bob');
    expect(secret).toBeDefined();

    const bobSecret = await deriveSharedSecret(await alice.createOffer(2), bob.getExchangeSecretKey());
    const envelope = await encrypt(secret?.key ?? new Uint8Array(32), 'still here', alice.getExchangePublicKey());
    expect(utf8Decode(await openEnvelope(bobSecret.key, envelope))).toBe('still here');
  });

  describe('on disk', () => {
    let tempDir: string;
    let loader: ConfigLoader;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'chanseal-int-'));
      loader = new ConfigLoader({ baseDir: tempDir });
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    test('should persist a bridge to the store directory and load it back', async () => {
      loader.saveConfig({ storeKey: 'laptop' });

      const first = HostBridge.fromConfigLoader(loader);
      const peer = new HostBridge();
      unwrap(await first.generateIdentity());
      unwrap(await peer.generateIdentity());
      unwrap(await first.acceptOffer('peer', unwrap(await peer.createOffer())));
      unwrap(await peer.acceptOffer('first', unwrap(await first.createOffer())));
      unwrap(await first.save('test-password'));

      expect(fs.existsSync(path.join(tempDir, 'store', 'keystore', 'laptop'))).toBe(true);

      const second = HostBridge.fromConfigLoader(loader);
      expect(unwrap(await second.load('test-password'))).toBe(true);

      const sealed = unwrap(await second.encryptDirect('peer', 'after restart'));
      expect(unwrap(await peer.decryptDirect('first', sealed)).text).toBe('after restart');
    });
  });
});
