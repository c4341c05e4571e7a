import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HostBridge, fail, ok, type Outcome } from '../../src/bridge';
import { AuditLogger } from '../../src/audit';
import { ChansealConfig } from '../../src/config';
import { MemoryStorage } from '../../src/storage/memory';
import { ProtectionMode, type PlatformProtector } from '../../src/store/blob';
import { ErrorCode } from '../../src/errors';
import { fromBase64Url, toBase64Url } from '../../src/encoding';
import { decodeEnvelope, serializeEnvelope } from '../../src/encryption/aead';
import { decodeOffer, serializeOffer } from '../../src/encryption/offer';

function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new Error(`Expected success, got ${outcome.error}`);
  }
  return outcome.value;
}

const identityPlatform: PlatformProtector = {
  protect: async (data) => new Uint8Array(data),
  unprotect: async (data) => new Uint8Array(data),
};

async function pair(first: HostBridge, firstName: string, second: HostBridge, secondName: string): Promise<void> {
  const firstOffer = unwrap(await first.createOffer());
  const secondOffer = unwrap(await second.createOffer());
  unwrap(await first.acceptOffer(secondName, secondOffer));
  unwrap(await second.acceptOffer(firstName, firstOffer));
}

class FailingStorage extends MemoryStorage {
  async set(): Promise<void> {
    throw new Error('disk full');
  }
}

describe('HostBridge', () => {
  let alice: HostBridge;
  let bob: HostBridge;

  beforeEach(async () => {
    alice = new HostBridge();
    bob = new HostBridge();
    unwrap(await alice.generateIdentity());
    unwrap(await bob.generateIdentity());
  });

  describe('outcomes', () => {
    it('should build success and failure values', () => {
      expect(ok(3)).toEqual({ ok: true, value: 3 });
      expect(fail(ErrorCode.KDF_ERROR)).toEqual({ ok: false, error: 'KDF_ERROR' });
    });
  });

  describe('identity and offers', () => {
    it('should return public info only', async () => {
      const bridge = new HostBridge();

      const info = unwrap(await bridge.generateIdentity());

      expect(Object.keys(info).sort()).toEqual(['exchange_public_key', 'fingerprint', 'signing_public_key']);
      expect(bridge.getKeystore().getIdentity()?.fingerprint).toBe(info.fingerprint);
    });

    it('should refuse to create an offer without an identity', async () => {
      const bridge = new HostBridge();

      expect(await bridge.createOffer()).toEqual({ ok: false, error: ErrorCode.INVALID_KEY_MATERIAL });
    });

    it('should use the configured offer version by default', async () => {
      const legacy = new HostBridge({ config: new ChansealConfig({ defaultOfferVersion: 1 }) });
      unwrap(await legacy.generateIdentity());

      const text = unwrap(await legacy.createOffer());

      expect(text).toContain('"v":1');
      expect(unwrap(await legacy.createOffer(2))).toContain('"v":2');
    });

    it('should report the peer fingerprint on acceptance', async () => {
      const bobFingerprint = bob.getKeystore().getIdentity()?.fingerprint;

      const accepted = unwrap(await alice.acceptOffer('bob', unwrap(await bob.createOffer())));

      expect(accepted).toEqual({ peerId: 'bob', fingerprint: bobFingerprint });
      expect(alice.getKeystore().listPeers()).toEqual(['bob']);
    });

    it('should reject tampered and malformed offers', async () => {
      const mallory = new HostBridge();
      unwrap(await mallory.generateIdentity());
      const wire = serializeOffer(decodeOffer(unwrap(await bob.createOffer())));
      const malloryWire = serializeOffer(decodeOffer(unwrap(await mallory.createOffer())));
      const tampered = JSON.stringify({ ...wire, idPub: malloryWire.idPub });

      expect(await alice.acceptOffer('bob', tampered)).toEqual({ ok: false, error: ErrorCode.SIGNATURE_INVALID });
      expect(await alice.acceptOffer('bob', 'garbage')).toEqual({ ok: false, error: ErrorCode.INPUT_FORMAT_ERROR });
      expect(await alice.acceptOffer('', unwrap(await bob.createOffer()))).toEqual({
        ok: false,
        error: ErrorCode.INPUT_FORMAT_ERROR,
      });
      expect(alice.getKeystore().listPeers()).toEqual([]);
    });

    it('should record rejected offers in the audit log', async () => {
      await alice.acceptOffer('bob', 'garbage');

      const [event] = alice.getAuditLogger().query({ type: 'OFFER_REJECTED' });
      expect(event?.code).toBe(ErrorCode.INPUT_FORMAT_ERROR);
      expect(event?.peerId).toBe('bob');
    });
  });

  describe('direct messages', () => {
    beforeEach(async () => {
      await pair(alice, 'alice', bob, 'bob');
    });

    it('should deliver a direct message', async () => {
      const sealed = unwrap(await alice.encryptDirect('bob', 'hello'));

      expect(unwrap(await bob.decryptDirect('alice', sealed))).toEqual({ peerId: 'alice', text: 'hello' });
    });

    it('should find the sender from the envelope', async () => {
      const sealed = unwrap(await alice.encryptDirect('bob', 'hello'));

      expect(unwrap(await bob.decryptDirect(undefined, sealed)).peerId).toBe('alice');
    });

    it('should fail for an unknown peer', async () => {
      expect(await alice.encryptDirect('carol', 'hello')).toEqual({
        ok: false,
        error: ErrorCode.INVALID_KEY_MATERIAL,
      });
    });

    it('should fail authentication for a tampered envelope', async () => {
      const sealed = unwrap(await alice.encryptDirect('bob', 'hello'));
      const wire = serializeEnvelope(decodeEnvelope(sealed));
      const cipher = fromBase64Url(wire.cipher);
      cipher[0] = (cipher[0] ?? 0) ^ 0x01;

      const result = await bob.decryptDirect('alice', JSON.stringify({ ...wire, cipher: toBase64Url(cipher) }));

      expect(result).toEqual({ ok: false, error: ErrorCode.AUTHENTICATION_FAILED });
    });

    it('should refuse channel envelopes', async () => {
      unwrap(await alice.createChannelKey('#general', 'example.net'));
      const channelText = unwrap(await alice.encryptChannel('#general', 'example.net', 'hi'));

      expect(await bob.decryptDirect('alice', channelText)).toEqual({
        ok: false,
        error: ErrorCode.INPUT_FORMAT_ERROR,
      });
    });

    it('should enforce the plaintext limit from config', async () => {
      const small = new HostBridge({ config: new ChansealConfig({ maxPlaintextBytes: 4 }) });
      unwrap(await small.generateIdentity());
      await pair(small, 'alice', bob, 'bob');

      expect(await small.encryptDirect('bob', 'hello')).toEqual({ ok: false, error: ErrorCode.PAYLOAD_TOO_LARGE });
      expect(unwrap(await small.encryptDirect('bob', 'hell'))).toContain('"v":2');
    });
  });

  describe('channels', () => {
    beforeEach(async () => {
      await pair(alice, 'alice', bob, 'bob');
    });

    it('should share a channel key and exchange channel messages', async () => {
      expect(unwrap(await alice.createChannelKey('#General', 'example.net'))).toBe('example.net/#general');

      const sealedKey = unwrap(await alice.shareChannelKey('bob', '#General', 'example.net'));
      expect(unwrap(await bob.acceptChannelKey('alice', sealedKey))).toBe('example.net/#general');

      const message = unwrap(await bob.encryptChannel('#general', 'example.net', 'hi all'));
      expect(unwrap(await alice.decryptChannel('#GENERAL', 'example.net', message))).toBe('hi all');
    });

    it('should fail without a channel key', async () => {
      expect(await alice.encryptChannel('#none', 'example.net', 'hi')).toEqual({
        ok: false,
        error: ErrorCode.INVALID_KEY_MATERIAL,
      });
      expect(await alice.shareChannelKey('bob', '#none', 'example.net')).toEqual({
        ok: false,
        error: ErrorCode.INVALID_KEY_MATERIAL,
      });
    });

    it('should not open a message sealed under another channel key', async () => {
      unwrap(await alice.createChannelKey('#general', 'example.net'));
      unwrap(await bob.createChannelKey('#general', 'example.net'));

      const message = unwrap(await alice.encryptChannel('#general', 'example.net', 'hi'));

      expect(await bob.decryptChannel('#general', 'example.net', message)).toEqual({
        ok: false,
        error: ErrorCode.AUTHENTICATION_FAILED,
      });
    });

    it('should refuse a channel key from the wrong peer', async () => {
      const carol = new HostBridge();
      unwrap(await carol.generateIdentity());
      await pair(alice, 'alice', carol, 'carol');
      unwrap(await alice.createChannelKey('#general', 'example.net'));
      const sealedForCarol = unwrap(await alice.shareChannelKey('carol', '#general', 'example.net'));

      expect(await bob.acceptChannelKey('alice', sealedForCarol)).toEqual({
        ok: false,
        error: ErrorCode.AUTHENTICATION_FAILED,
      });
    });

    it('should refuse a direct envelope on a channel', async () => {
      unwrap(await alice.createChannelKey('#general', 'example.net'));
      const direct = unwrap(await alice.encryptDirect('bob', 'hi'));

      expect(await alice.decryptChannel('#general', 'example.net', direct)).toEqual({
        ok: false,
        error: ErrorCode.INPUT_FORMAT_ERROR,
      });
    });

    it('should enable and disable channels', async () => {
      unwrap(await alice.enableChannel('#general', 'example.net'));
      expect(alice.isChannelEnabled('#GENERAL', 'example.net')).toBe(true);

      unwrap(await alice.disableChannel('#general', 'example.net'));
      expect(alice.isChannelEnabled('#general', 'example.net')).toBe(false);

      expect(await alice.enableChannel('', 'example.net')).toEqual({ ok: false, error: ErrorCode.INPUT_FORMAT_ERROR });
    });
  });

  describe('persistence', () => {
    it('should save and load with a password', async () => {
      const storage = new MemoryStorage();
      const saver = new HostBridge({ storage });
      const info = unwrap(await saver.generateIdentity());
      unwrap(await saver.createChannelKey('#general', 'example.net'));
      unwrap(await saver.save('test-password'));

      const loader = new HostBridge({ storage });
      expect(unwrap(await loader.load('test-password'))).toBe(true);

      expect(loader.getKeystore().getIdentity()?.fingerprint).toBe(info.fingerprint);
      expect(loader.getKeystore().listChannels()).toEqual(['example.net/#general']);
      expect(loader.getAuditLogger().query({ type: 'IDENTITY_LOADED' })[0]?.fingerprint).toBe(info.fingerprint);
    });

    it('should report nothing to load', async () => {
      expect(await alice.load('test-password')).toEqual({ ok: true, value: false });
    });

    it('should fail to load with the wrong password and keep the current keystore', async () => {
      const storage = new MemoryStorage();
      const bridge = new HostBridge({ storage });
      unwrap(await bridge.generateIdentity());
      unwrap(await bridge.save('test-password'));
      const before = bridge.getKeystore();

      expect(await bridge.load('wrong-password')).toEqual({ ok: false, error: ErrorCode.DECRYPTION_FAILED });
      expect(bridge.getKeystore()).toBe(before);
      expect(bridge.getAuditLogger().getErrors()[0]?.type).toBe('STORE_FAILED');
    });

    it('should switch persistence modes', async () => {
      const storage = new MemoryStorage();
      const bridge = new HostBridge({ storage, platform: identityPlatform });
      unwrap(await bridge.generateIdentity());

      expect(unwrap(await bridge.setPersistenceMode('platform'))).toBe(ProtectionMode.PLATFORM_PROTECT);
      unwrap(await bridge.save());
      expect(unwrap(await bridge.load())).toBe(true);

      unwrap(await bridge.setPersistenceMode('none'));
      expect(await bridge.save()).toEqual({ ok: false, error: ErrorCode.PERSISTENCE_DISABLED });
      expect(await bridge.setPersistenceMode('vault')).toEqual({ ok: false, error: ErrorCode.INPUT_FORMAT_ERROR });
      expect(bridge.getPersistenceMode()).toBe(ProtectionMode.NONE);
    });

    it('should report a missing platform service', async () => {
      const config = new ChansealConfig({ persistenceMode: ProtectionMode.PLATFORM_PROTECT });
      const bridge = new HostBridge({ config });
      unwrap(await bridge.generateIdentity());

      expect(await bridge.save()).toEqual({ ok: false, error: ErrorCode.PLATFORM_SERVICE_UNAVAILABLE });
    });

    it('should require a password in password mode', async () => {
      expect(await alice.save()).toEqual({ ok: false, error: ErrorCode.INPUT_FORMAT_ERROR });
      expect(await alice.save('')).toEqual({ ok: false, error: ErrorCode.INPUT_FORMAT_ERROR });
    });
  });

  describe('audit failures', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should complete operations when audit events cannot be stored', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const bridge = new HostBridge({ auditLogger: new AuditLogger({ storage: new FailingStorage() }) });

      const info = unwrap(await bridge.generateIdentity());
      const accepted = unwrap(await bridge.acceptOffer('bob', unwrap(await bob.createOffer())));

      expect(bridge.getKeystore().getIdentity()?.fingerprint).toBe(info.fingerprint);
      expect(accepted.peerId).toBe('bob');
      expect(bridge.getKeystore().listPeers()).toEqual(['bob']);
      expect(warn).toHaveBeenCalledWith('Failed to record audit event: disk full');
    });

    it('should keep the operation error when the audit write also fails', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const bridge = new HostBridge({ auditLogger: new AuditLogger({ storage: new FailingStorage() }) });

      expect(await bridge.createOffer()).toEqual({ ok: false, error: ErrorCode.INVALID_KEY_MATERIAL });
    });
  });

  it('should not accept a direct envelope whose sender is unknown', async () => {
    const stranger = toBase64Url(new Uint8Array(32).fill(1));
    const envelope = JSON.stringify({
      v: 2,
      from: stranger,
      nonce: toBase64Url(new Uint8Array(24)),
      cipher: toBase64Url(new Uint8Array(16)),
    });

    expect(await bob.decryptDirect(undefined, envelope)).toEqual({ ok: false, error: ErrorCode.INVALID_KEY_MATERIAL });
  });
});
