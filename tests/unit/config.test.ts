import { describe, it, expect } from 'vitest';
import { ChansealConfig, DEFAULT_MAX_PLAINTEXT_BYTES } from '../../src/config';
import { ProtectionMode } from '../../src/store/blob';
import { ErrorCode } from '../../src/errors';
import { errorCodeOfSync } from '../helpers';

describe('ChansealConfig', () => {
  it('should apply defaults', () => {
    const config = new ChansealConfig();

    expect(config.toJSON()).toEqual({
      persistenceMode: ProtectionMode.PASSWORD,
      maxPlaintextBytes: DEFAULT_MAX_PLAINTEXT_BYTES,
      defaultOfferVersion: 2,
      storeKey: 'default',
      auditConsole: false,
    });
    expect(DEFAULT_MAX_PLAINTEXT_BYTES).toBe(4096);
  });

  it('should accept explicit options', () => {
    const config = new ChansealConfig({
      persistenceMode: ProtectionMode.PLATFORM_PROTECT,
      maxPlaintextBytes: 512,
      defaultOfferVersion: 1,
      storeKey: 'work_2',
      auditConsole: true,
    });

    expect(config.persistenceMode).toBe(ProtectionMode.PLATFORM_PROTECT);
    expect(config.maxPlaintextBytes).toBe(512);
    expect(config.defaultOfferVersion).toBe(1);
    expect(config.storeKey).toBe('work_2');
    expect(config.auditConsole).toBe(true);
  });

  it('should reject invalid limits and store names', () => {
    expect(errorCodeOfSync(() => new ChansealConfig({ maxPlaintextBytes: 0 }))).toBe(ErrorCode.INPUT_FORMAT_ERROR);
    expect(errorCodeOfSync(() => new ChansealConfig({ maxPlaintextBytes: 1.5 }))).toBe(ErrorCode.INPUT_FORMAT_ERROR);
    expect(errorCodeOfSync(() => new ChansealConfig({ storeKey: '../other' }))).toBe(ErrorCode.INPUT_FORMAT_ERROR);
  });

  describe('fromJSON', () => {
    it('should read a partial document', () => {
      const config = ChansealConfig.fromJSON({ persistenceMode: 'none', maxPlaintextBytes: 100 });

      expect(config.persistenceMode).toBe(ProtectionMode.NONE);
      expect(config.maxPlaintextBytes).toBe(100);
      expect(config.storeKey).toBe('default');
    });

    it('should round-trip through toJSON', () => {
      const config = new ChansealConfig({ maxPlaintextBytes: 1000, defaultOfferVersion: 1 });

      expect(ChansealConfig.fromJSON(config.toJSON()).toJSON()).toEqual(config.toJSON());
    });

    it('should reject fields of the wrong type', () => {
      expect(errorCodeOfSync(() => ChansealConfig.fromJSON({ persistenceMode: 'vault' }))).toBe(
        ErrorCode.INPUT_FORMAT_ERROR
      );
      expect(errorCodeOfSync(() => ChansealConfig.fromJSON({ maxPlaintextBytes: '4096' }))).toBe(
        ErrorCode.INPUT_FORMAT_ERROR
      );
      expect(errorCodeOfSync(() => ChansealConfig.fromJSON({ defaultOfferVersion: 3 }))).toBe(
        ErrorCode.INPUT_FORMAT_ERROR
      );
      expect(errorCodeOfSync(() => ChansealConfig.fromJSON({ storeKey: 5 }))).toBe(ErrorCode.INPUT_FORMAT_ERROR);
      expect(errorCodeOfSync(() => ChansealConfig.fromJSON({ auditConsole: 'yes' }))).toBe(
        ErrorCode.INPUT_FORMAT_ERROR
      );
    });
  });
});
