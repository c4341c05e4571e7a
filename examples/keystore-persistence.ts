/**
 * Keystore Persistence Example
 *
 * Saves the keystore under a password in ~/.chanseal (or CHANSEAL_HOME)
 * and loads it back in a fresh bridge.
 */

import { ConfigLoader, HostBridge } from '../src/index';

async function main() {
  console.log('=== Keystore Persistence Demo ===\n');

  const loader = new ConfigLoader({ gracefulFallback: true });
  console.log('Config:', loader.getConfigPath());
  console.log('Store: ', loader.getStoreDir());
  console.log();

  const bridge = HostBridge.fromConfigLoader(loader);
  const created = await bridge.generateIdentity();
  if (!created.ok) {
    throw new Error(`identity: ${created.error}`);
  }
  console.log('Generated identity', created.value.fingerprint);

  const saved = await bridge.save('example-password');
  console.log('Saved:', saved.ok ? 'yes' : saved.error);

  const restored = HostBridge.fromConfigLoader(loader);
  const loaded = await restored.load('example-password');
  console.log('Loaded:', loaded.ok ? loaded.value : loaded.error);
  console.log('Fingerprint matches:', restored.getKeystore().getIdentity()?.fingerprint === created.value.fingerprint);

  const wrong = await restored.load('not-the-password');
  console.log('Wrong password:', wrong.ok ? 'accepted' : wrong.error);
}

main().catch(console.error);
