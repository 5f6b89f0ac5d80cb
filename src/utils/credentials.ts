import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';

import { createLogger } from '../middleware/logger.js';
import { ConfigurationError } from './errors.js';

const logger = createLogger({ component: 'credentials' });

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;

const CredentialsSchema = z.record(z.string(), z.unknown());
export type Credentials = z.infer<typeof CredentialsSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read the base64 encryption key at `path`, generating and writing a new
 * one (mode 0600) when none exists yet.
 */
export async function loadOrCreateKey(path: string): Promise<Buffer> {
  try {
    const key = Buffer.from((await readFile(path, 'utf-8')).trim(), 'base64');
    if (key.length !== KEY_BYTES) {
      throw new ConfigurationError(`Key file ${path} does not hold a ${KEY_BYTES}-byte key`);
    }
    return key;
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }

  const key = randomBytes(KEY_BYTES);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${key.toString('base64')}\n`, { encoding: 'utf-8', mode: 0o600 });
  await chmod(path, 0o600);
  logger.info({ path }, 'Generated new credential key');
  return key;
}

/** AES-256-GCM. Output layout: iv (12) | auth tag (16) | ciphertext. */
export function encryptCredentials(creds: Credentials, key: Buffer): Buffer {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(ALGORITHM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(JSON.stringify(creds), 'utf-8'), cipher.final()]);
  return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]);
}

/** Inverse of encryptCredentials. Throws if the blob was altered or the key is wrong. */
export function decryptCredentials(blob: Buffer, key: Buffer): Credentials {
  if (blob.length < IV_BYTES + TAG_BYTES) {
    throw new Error('Encrypted credential blob is truncated');
  }
  const iv = blob.subarray(0, IV_BYTES);
  const tag = blob.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
  const ciphertext = blob.subarray(IV_BYTES + TAG_BYTES);

  const decipher = createDecipheriv(ALGORITHM, key, iv);
  decipher.setAuthTag(tag);
  const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf-8');
  return CredentialsSchema.parse(JSON.parse(plaintext));
}

/**
 * Encrypted JSON credential file. Values are kept in memory after load();
 * save() re-encrypts the whole object with a fresh IV.
 */
export class CredentialStore {
  private values: Credentials = {};

  constructor(
    readonly path: string,
    private readonly key: Buffer,
  ) {}

  async load(): Promise<Credentials> {
    try {
      this.values = decryptCredentials(await readFile(this.path), this.key);
    } catch (err) {
      if (!isMissingFile(err)) throw err;
      this.values = {};
    }
    return { ...this.values };
  }

  set(name: string, value: unknown): void {
    this.values[name] = value;
  }

  async save(): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, encryptCredentials(this.values, this.key), { mode: 0o600 });
  }
}

/**
 * Read required environment variables. Throws a ConfigurationError naming
 * every one that is unset or empty.
 */
export function loadEnv(
  requiredVars: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const values: Record<string, string> = {};
  const missing: string[] = [];

  for (const name of requiredVars) {
    const value = env[name];
    if (value) values[name] = value;
    else missing.push(name);
  }

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required environment variable(s): ${missing.join(', ')}`);
  }
  return values;
}
