export {
  ProtectionMode,
  isProtectionMode,
  encryptBlob,
  decryptBlob,
  derivePasswordKey,
  type PlatformProtector,
  type BlobOptions,
} from './blob';
export { SecureStore, type SecureStoreOptions } from './secure-store';
