/**
 * Encrypt a plaintext JSON credentials file into the credential store.
 *
 * Usage: npm run credentials:encrypt -- path/to/plain.json
 *
 * Keys already in the store are kept unless the input overrides them.
 * Delete the plaintext file afterwards.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { config, resolveProjectPath } from '../src/utils/config.js';
import { CredentialStore, loadOrCreateKey } from '../src/utils/credentials.js';

const PlainCredentialsSchema = z.record(z.string(), z.string());

async function main(): Promise<void> {
  const input = process.argv[2];
  if (!input) {
    console.error('Usage: encrypt-credentials <plain.json>');
    process.exit(1);
  }

  const plain = PlainCredentialsSchema.parse(JSON.parse(await readFile(input, 'utf-8')));
  const key = await loadOrCreateKey(resolveProjectPath(config.HERALD_KEY_PATH));
  const store = new CredentialStore(resolveProjectPath(config.HERALD_CREDENTIALS), key);

  await store.load();
  for (const [name, value] of Object.entries(plain)) store.set(name, value);
  await store.save();

  console.log(`✅ Stored ${Object.keys(plain).length} credential(s) in ${store.path}`);
}

main().catch((err) => {
  console.error('❌ Failed to encrypt credentials:', err instanceof Error ? err.message : err);
  process.exit(1);
});
