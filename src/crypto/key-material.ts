/**
 * Key Material for Protected Fields
 *
 * One persisted 32-byte secret; two working keys derived from it with HKDF:
 * - AES-256-GCM key for randomized display ciphertext
 * - HMAC-SHA-256 key for deterministic pseudonyms
 *
 * Losing the secret permanently strands every previously encrypted field.
 */

import { webcrypto } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from '~/telemetry/logger';
import { ConfigurationError } from '~/types';

export const SECRET_SIZE = 32;

const HKDF_SALT = Buffer.from('fleetvault-field-keys', 'utf8');
const DISPLAY_INFO = Buffer.from('FleetVault-Display-v1', 'utf8');
const PSEUDONYM_INFO = Buffer.from('FleetVault-Pseudonym-v1', 'utf8');

export interface FieldKeys {
  /** Randomized encryption of displayed values */
  displayKey: webcrypto.CryptoKey;
  /** Keyed one-way transform for lookup tokens */
  pseudonymKey: webcrypto.CryptoKey;
}

/**
 * Generate a fresh random secret
 */
export function generateSecret(): Uint8Array {
  return webcrypto.getRandomValues(new Uint8Array(SECRET_SIZE));
}

/**
 * @throws {ConfigurationError} If the secret has the wrong size
 */
export function validateSecret(secret: Uint8Array): void {
  if (secret.length !== SECRET_SIZE) {
    throw new ConfigurationError(
      `Field secret must be ${SECRET_SIZE} bytes, got ${secret.length}`
    );
  }
}

export function exportSecretToBase64(secret: Uint8Array): string {
  validateSecret(secret);
  return Buffer.from(secret).toString('base64');
}

export function importSecretFromBase64(encoded: string): Uint8Array {
  const secret = new Uint8Array(Buffer.from(encoded.trim(), 'base64'));
  validateSecret(secret);
  return secret;
}

/**
 * Derive the display and pseudonym keys from the master secret
 */
export async function deriveFieldKeys(secret: Uint8Array): Promise<FieldKeys> {
  validateSecret(secret);

  const baseKey = await webcrypto.subtle.importKey('raw', secret, { name: 'HKDF' }, false, [
    'deriveKey'
  ]);

  const [displayKey, pseudonymKey] = await Promise.all([
    webcrypto.subtle.deriveKey(
      { name: 'HKDF', hash: 'SHA-256', salt: HKDF_SALT, info: DISPLAY_INFO },
      baseKey,
      { name: 'AES-GCM', length: 256 },
      false,
      ['encrypt', 'decrypt']
    ),
    webcrypto.subtle.deriveKey(
      { name: 'HKDF', hash: 'SHA-256', salt: HKDF_SALT, info: PSEUDONYM_INFO },
      baseKey,
      { name: 'HMAC', hash: 'SHA-256', length: 256 },
      false,
      ['sign']
    )
  ]);

  return { displayKey, pseudonymKey };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the persisted secret, generating and persisting one on first run.
 *
 * @param path - Secret file location, kept apart from the datastore
 * @returns The secret and whether it was created by this call
 */
export async function loadOrCreateSecret(
  path: string,
  logger?: Logger
): Promise<{ secret: Uint8Array; created: boolean }> {
  try {
    const encoded = await readFile(path, 'utf8');
    return { secret: importSecretFromBase64(encoded), created: false };
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }

  const secret = generateSecret();
  await mkdir(dirname(path), { recursive: true });
  // wx: never clobber a secret written concurrently by another process
  await writeFile(path, exportSecretToBase64(secret) + '\n', { mode: 0o600, flag: 'wx' });
  logger?.warn('Generated new field encryption secret; back it up, data is unrecoverable without it', {
    path
  });

  return { secret, created: true };
}
