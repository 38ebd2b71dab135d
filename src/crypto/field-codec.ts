/**
 * Protected-Field Codec
 *
 * - encryptDisplay / decryptDisplay: AES-256-GCM with a random IV per call,
 *   so equal plaintexts never produce equal ciphertexts
 * - pseudonymize: HMAC-SHA-256, the same input always yields the same token;
 *   used wherever equality lookup or uniqueness is needed
 *
 * Envelope layout (base64): version (1 byte) | IV (12 bytes) | ciphertext+tag
 */

import { webcrypto } from 'node:crypto';
import { deriveFieldKeys, type FieldKeys } from './key-material';
import { DecryptionError } from '~/types';

export const ENVELOPE_VERSION = 1;
export const IV_SIZE = 12;
export const AUTH_TAG_SIZE = 16;

export interface DisplayEnvelope {
  version: number;
  iv: Uint8Array;
  /** Ciphertext with the GCM tag appended */
  sealed: Uint8Array;
}

export function serializeEnvelope(envelope: DisplayEnvelope): string {
  const bytes = new Uint8Array(1 + envelope.iv.length + envelope.sealed.length);
  bytes[0] = envelope.version;
  bytes.set(envelope.iv, 1);
  bytes.set(envelope.sealed, 1 + envelope.iv.length);
  return Buffer.from(bytes).toString('base64');
}

/**
 * @throws {DecryptionError} If the value is not a well-formed envelope
 */
export function deserializeEnvelope(encoded: string): DisplayEnvelope {
  const bytes = new Uint8Array(Buffer.from(encoded, 'base64'));

  if (bytes.length < 1 + IV_SIZE + AUTH_TAG_SIZE) {
    throw new DecryptionError('Ciphertext is truncated or not an envelope');
  }
  if (bytes[0] !== ENVELOPE_VERSION) {
    throw new DecryptionError(`Unsupported envelope version ${bytes[0]}`);
  }

  return {
    version: bytes[0],
    iv: bytes.slice(1, 1 + IV_SIZE),
    sealed: bytes.slice(1 + IV_SIZE)
  };
}

export class FieldCodec {
  private constructor(private readonly keys: FieldKeys) {}

  /**
   * Build a codec from the persisted master secret
   */
  static async fromSecret(secret: Uint8Array): Promise<FieldCodec> {
    return new FieldCodec(await deriveFieldKeys(secret));
  }

  /**
   * Randomized encryption for values that are only ever displayed
   */
  async encryptDisplay(plaintext: string): Promise<string> {
    const iv = webcrypto.getRandomValues(new Uint8Array(IV_SIZE));
    const sealed = await webcrypto.subtle.encrypt(
      { name: 'AES-GCM', iv, tagLength: AUTH_TAG_SIZE * 8 },
      this.keys.displayKey,
      Buffer.from(plaintext, 'utf8')
    );

    return serializeEnvelope({ version: ENVELOPE_VERSION, iv, sealed: new Uint8Array(sealed) });
  }

  /**
   * @throws {DecryptionError} If the key changed or the ciphertext was altered
   */
  async decryptDisplay(ciphertext: string): Promise<string> {
    const envelope = deserializeEnvelope(ciphertext);

    try {
      const plain = await webcrypto.subtle.decrypt(
        { name: 'AES-GCM', iv: envelope.iv, tagLength: AUTH_TAG_SIZE * 8 },
        this.keys.displayKey,
        envelope.sealed
      );
      return Buffer.from(plain).toString('utf8');
    } catch (error) {
      throw new DecryptionError(
        `Field authentication failed - key changed or data tampered (${error instanceof Error ? error.name : String(error)})`
      );
    }
  }

  /**
   * Deterministic keyed token. Callers canonicalize (case, whitespace) first
   */
  async pseudonymize(plaintext: string): Promise<string> {
    const mac = await webcrypto.subtle.sign(
      'HMAC',
      this.keys.pseudonymKey,
      Buffer.from(plaintext, 'utf8')
    );
    return Buffer.from(mac).toString('base64url');
  }

  /**
   * Encrypt a value that may be absent
   */
  async encryptOptional(plaintext: string | null): Promise<string | null> {
    return plaintext === null ? null : await this.encryptDisplay(plaintext);
  }
}
