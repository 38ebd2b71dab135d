/**
 * Credential Store
 *
 * One-way password hashing. bcrypt embeds a fresh random salt in every hash;
 * stored credentials are never decrypted or exposed.
 */

import { timingSafeEqual } from 'node:crypto';
import bcrypt from 'bcryptjs';

export const DEFAULT_BCRYPT_ROUNDS = 12;

export class CredentialStore {
  constructor(private readonly rounds: number = DEFAULT_BCRYPT_ROUNDS) {}

  async hash(password: string): Promise<string> {
    return await bcrypt.hash(password, this.rounds);
  }

  /**
   * Returns false for a wrong password or a malformed stored credential
   */
  async verify(password: string, credential: string): Promise<boolean> {
    try {
      return await bcrypt.compare(password, credential);
    } catch {
      return false;
    }
  }
}

/**
 * Constant-time comparison used for the configured owner credential,
 * which bypasses the accounts table
 */
export function matchesFixedCredential(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(a, b);
}
