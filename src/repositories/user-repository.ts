/**
 * Staff Account Repository
 *
 * Usernames are stored twice: a deterministic token that carries the
 * UNIQUE constraint and serves login lookup, and a randomized ciphertext
 * for display. Passwords are bcrypt hashes and never leave this module.
 */

import { randomInt } from 'node:crypto';
import type { TargetAccount } from '~/policies/authorization';
import { inTransaction, nowTimestamp } from '~/storage/database';
import { UserStore, type UserRow, type UserRowChanges } from '~/storage/user-store';
import {
  newUserSchema,
  parseFields,
  parseSearchTerm,
  passwordSchema,
  profileChangesSchema,
  type NewUserInput,
  type ProfileChanges
} from '~/validation/fields';
import { ConflictError, NotFoundError, ValidationError, succeed } from '~/types';
import type { Outcome, Readout, Session, UserAccount } from '~/types';
import { authorize, matchesTerm, readout, reject, type RepositoryContext } from './context';

const TEMP_PASSWORD_LENGTH = 16;
const LOWER = 'abcdefghijkmnopqrstuvwxyz';
const UPPER = 'ABCDEFGHJKLMNPQRSTUVWXYZ';
const DIGITS = '23456789';
const SPECIALS = '!@#$%&*?';

function pick(alphabet: string): string {
  return alphabet[randomInt(alphabet.length)];
}

/**
 * Random password that satisfies the password policy
 */
export function generateTemporaryPassword(): string {
  const all = LOWER + UPPER + DIGITS + SPECIALS;
  const chars = [pick(LOWER), pick(UPPER), pick(DIGITS), pick(SPECIALS)];
  while (chars.length < TEMP_PASSWORD_LENGTH) {
    chars.push(pick(all));
  }
  // Fisher-Yates so the required classes are not always in front
  for (let i = chars.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [chars[i], chars[j]] = [chars[j], chars[i]];
  }
  return chars.join('');
}

export class UserRepository {
  private readonly store: UserStore;

  constructor(private readonly ctx: RepositoryContext) {
    this.store = new UserStore(ctx.db);
  }

  private async decrypt(row: UserRow): Promise<UserAccount> {
    const { codec } = this.ctx;
    const [username, firstName, lastName] = await Promise.all([
      codec.decryptDisplay(row.usernameCipher),
      codec.decryptDisplay(row.firstNameCipher),
      codec.decryptDisplay(row.lastNameCipher)
    ]);
    return { id: row.id, username, role: row.role, firstName, lastName, createdAt: row.createdAt };
  }

  private requireRow(id: number): UserRow {
    const row = this.store.findById(id);
    if (!row) {
      throw new NotFoundError('User', id);
    }
    return row;
  }

  /**
   * Target of an account-level decision. A missing account is judged as
   * the least-privileged target, so a refusal looks the same whether or
   * not the id exists.
   */
  private async targetOf(id: number, row: UserRow | null): Promise<TargetAccount> {
    if (!row) {
      return { identity: `#${id}`, role: 'operator' };
    }
    return { identity: await this.ctx.codec.decryptDisplay(row.usernameCipher), role: row.role };
  }

  private assertNotReserved(username: string): void {
    if (username === this.ctx.ownerIdentity) {
      throw new ConflictError(`Username ${username} is reserved`, 'username');
    }
  }

  /**
   * Create an administrator (owner only) or operator account
   */
  async create(session: Session, input: NewUserInput): Promise<Outcome<UserAccount>> {
    const action = input.role === 'administrator' ? 'create-admin' : 'create-operator';
    const denied = await authorize(this.ctx, session, { action }, `${input.role} creation`);
    if (denied) return { ok: false, failure: denied };

    try {
      const values = parseFields(newUserSchema, input);
      this.assertNotReserved(values.username);

      const { codec, credentials } = this.ctx;
      const [usernameToken, usernameCipher, firstNameCipher, lastNameCipher, passwordHash] = await Promise.all([
        codec.pseudonymize(values.username),
        codec.encryptDisplay(values.username),
        codec.encryptDisplay(values.firstName),
        codec.encryptDisplay(values.lastName),
        credentials.hash(values.password)
      ]);
      const createdAt = nowTimestamp(this.ctx.clock());

      const id = inTransaction(this.ctx.db, 'create user', () => {
        if (this.store.tokenTaken(usernameToken)) {
          throw new ConflictError(`Username ${values.username} already exists`, 'username');
        }
        return this.store.insert({
          usernameToken,
          usernameCipher,
          passwordHash,
          role: values.role,
          firstNameCipher,
          lastNameCipher,
          createdAt
        });
      });

      await this.ctx.audit.record(session.identity, 'New user created', `Username: ${values.username}, Role: ${values.role}`, {
        eventType: 'data-create'
      });
      return succeed({
        id,
        username: values.username,
        role: values.role,
        firstName: values.firstName,
        lastName: values.lastName,
        createdAt
      });
    } catch (error) {
      return await reject(this.ctx, session, `Failed to create ${input.role}`, error);
    }
  }

  async getById(session: Session, id: number): Promise<Outcome<UserAccount>> {
    const denied = await authorize(this.ctx, session, { action: 'view-users' }, 'user lookup');
    if (denied) return { ok: false, failure: denied };

    try {
      const account = await this.decrypt(this.requireRow(id));
      await this.ctx.audit.record(session.identity, 'Viewed user', `User ID: ${id}`);
      return succeed(account);
    } catch (error) {
      return await reject(this.ctx, session, 'User lookup failed', error);
    }
  }

  async getAll(session: Session): Promise<Outcome<Readout<UserAccount>[]>> {
    const denied = await authorize(this.ctx, session, { action: 'view-users' }, 'user list access');
    if (denied) return { ok: false, failure: denied };

    const rows = this.store.all();
    const accounts = await Promise.all(rows.map((row) => readout(row, (r) => this.decrypt(r))));
    await this.ctx.audit.record(session.identity, 'Viewed user list', `Users: ${accounts.length}`);
    return succeed(accounts);
  }

  /**
   * Decrypts every account and matches the term against username, names and id
   */
  async search(session: Session, term: string): Promise<Outcome<UserAccount[]>> {
    const denied = await authorize(this.ctx, session, { action: 'view-users' }, 'user search');
    if (denied) return { ok: false, failure: denied };

    try {
      const needle = parseSearchTerm(term);
      const readouts = await Promise.all(this.store.all().map((row) => readout(row, (r) => this.decrypt(r))));

      const matches: UserAccount[] = [];
      for (const entry of readouts) {
        if (!entry.ok) {
          this.ctx.logger.warn('Skipping undecryptable account in search', { id: entry.id });
          continue;
        }
        const { value } = entry;
        if (matchesTerm(needle, [value.id, value.username, value.firstName, value.lastName])) {
          matches.push(value);
        }
      }

      await this.ctx.audit.record(session.identity, 'Searched users', `Matches: ${matches.length}`);
      return succeed(matches);
    } catch (error) {
      return await reject(this.ctx, session, 'User search failed', error);
    }
  }

  /**
   * Change username and/or names. All changed fields commit together.
   */
  async update(session: Session, id: number, changes: ProfileChanges): Promise<Outcome<UserAccount>> {
    try {
      const row = this.store.findById(id);
      const target = await this.targetOf(id, row);
      const denied = await authorize(this.ctx, session, { action: 'update-profile', target }, 'profile update');
      if (denied) return { ok: false, failure: denied };
      if (!row) {
        throw new NotFoundError('User', id);
      }
      const current = await this.decrypt(row);

      const values = parseFields(profileChangesSchema, changes);
      const { codec } = this.ctx;
      const patch: UserRowChanges = {};

      if (values.username !== undefined && values.username !== current.username) {
        this.assertNotReserved(values.username);
        patch.usernameToken = await codec.pseudonymize(values.username);
        patch.usernameCipher = await codec.encryptDisplay(values.username);
      }
      if (values.firstName !== undefined) {
        patch.firstNameCipher = await codec.encryptDisplay(values.firstName);
      }
      if (values.lastName !== undefined) {
        patch.lastNameCipher = await codec.encryptDisplay(values.lastName);
      }

      inTransaction(this.ctx.db, 'update user', () => {
        if (patch.usernameToken !== undefined && this.store.tokenTaken(patch.usernameToken, id)) {
          throw new ConflictError(`Username ${values.username} already exists`, 'username');
        }
        if (!this.store.update(id, patch)) {
          throw new NotFoundError('User', id);
        }
      });

      const updated: UserAccount = {
        ...current,
        username: values.username ?? current.username,
        firstName: values.firstName ?? current.firstName,
        lastName: values.lastName ?? current.lastName
      };
      await this.ctx.audit.record(session.identity, 'User profile updated', `User ID: ${id}, Fields: ${Object.keys(values).join(', ')}`, {
        eventType: 'data-update'
      });
      return succeed(updated);
    } catch (error) {
      return await reject(this.ctx, session, 'Profile update failed', error);
    }
  }

  /**
   * Hard delete. Resolves to false when there was nothing to delete.
   */
  async delete(session: Session, id: number): Promise<Outcome<boolean>> {
    const target = await this.targetOf(id, this.store.findById(id));
    const denied = await authorize(this.ctx, session, { action: 'delete-user', target }, 'user deletion');
    if (denied) return { ok: false, failure: denied };

    const removed = this.store.delete(id);
    if (removed) {
      await this.ctx.audit.record(session.identity, 'User deleted', `Username: ${target.identity}`, {
        eventType: 'data-delete'
      });
    } else {
      await this.ctx.audit.record(session.identity, 'User deletion skipped', `User ID: ${id} not found`);
    }
    return succeed(removed);
  }

  /**
   * Replace an account's password with a generated temporary one
   *
   * @returns The temporary password, to be handed to the account holder
   */
  async resetPassword(session: Session, id: number): Promise<Outcome<string>> {
    try {
      const row = this.store.findById(id);
      const target = await this.targetOf(id, row);
      const denied = await authorize(this.ctx, session, { action: 'reset-password', target }, 'password reset');
      if (denied) return { ok: false, failure: denied };
      if (!row) {
        throw new NotFoundError('User', id);
      }

      const temporary = generateTemporaryPassword();
      const passwordHash = await this.ctx.credentials.hash(temporary);
      if (!this.store.update(id, { passwordHash })) {
        throw new NotFoundError('User', id);
      }

      await this.ctx.audit.record(session.identity, 'Password reset', `Username: ${target.identity}`, {
        eventType: 'credential-change'
      });
      return succeed(temporary);
    } catch (error) {
      return await reject(this.ctx, session, 'Password reset failed', error);
    }
  }

  /**
   * Self-service password change; the owner's credential is fixed
   */
  async changeOwnPassword(session: Session, currentPassword: string, newPassword: string): Promise<Outcome<true>> {
    const denied = await authorize(this.ctx, session, { action: 'change-password' }, 'password change');
    if (denied) return { ok: false, failure: denied };

    try {
      const row = this.requireRow(session.userId);
      if (!(await this.ctx.credentials.verify(currentPassword, row.passwordHash))) {
        throw new ValidationError('Current password is incorrect', 'currentPassword');
      }
      const password = parseFields(passwordSchema, newPassword);
      if (password === currentPassword) {
        throw new ValidationError('New password must differ from the current password', 'newPassword');
      }

      const passwordHash = await this.ctx.credentials.hash(password);
      if (!this.store.update(row.id, { passwordHash })) {
        throw new NotFoundError('User', row.id);
      }

      await this.ctx.audit.record(session.identity, 'Password changed', '', { eventType: 'credential-change' });
      return succeed(true);
    } catch (error) {
      return await reject(this.ctx, session, 'Password change failed', error);
    }
  }
}
