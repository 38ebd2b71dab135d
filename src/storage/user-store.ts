/**
 * Accounts table. Holds ciphertext and tokens only; all crypto happens in
 * the repository layer.
 */

import { assignments, guardSql, type Db } from './database';

export interface UserRow {
  id: number;
  usernameToken: string;
  usernameCipher: string;
  passwordHash: string;
  role: 'administrator' | 'operator';
  firstNameCipher: string;
  lastNameCipher: string;
  createdAt: string;
}

export type NewUserRow = Omit<UserRow, 'id'>;

export type UserRowChanges = Partial<Omit<UserRow, 'id' | 'role' | 'createdAt'>>;

const SELECT = `
  SELECT id, username_token AS usernameToken, username_enc AS usernameCipher,
         password_hash AS passwordHash, role, first_name_enc AS firstNameCipher,
         last_name_enc AS lastNameCipher, created_at AS createdAt
  FROM users`;

const COLUMNS: ReadonlyArray<readonly [keyof UserRowChanges, string]> = [
  ['usernameToken', 'username_token'],
  ['usernameCipher', 'username_enc'],
  ['passwordHash', 'password_hash'],
  ['firstNameCipher', 'first_name_enc'],
  ['lastNameCipher', 'last_name_enc']
];

export class UserStore {
  constructor(private readonly db: Db) {}

  insert(row: NewUserRow): number {
    return guardSql('insert user', () => {
      const result = this.db
        .prepare<NewUserRow>(
          `INSERT INTO users (username_token, username_enc, password_hash, role, first_name_enc, last_name_enc, created_at)
           VALUES (@usernameToken, @usernameCipher, @passwordHash, @role, @firstNameCipher, @lastNameCipher, @createdAt)`
        )
        .run(row);
      return Number(result.lastInsertRowid);
    });
  }

  findById(id: number): UserRow | null {
    return guardSql('read user', () => {
      return this.db.prepare<[number], UserRow>(`${SELECT} WHERE id = ?`).get(id) ?? null;
    });
  }

  findByToken(usernameToken: string): UserRow | null {
    return guardSql('read user', () => {
      return this.db.prepare<[string], UserRow>(`${SELECT} WHERE username_token = ?`).get(usernameToken) ?? null;
    });
  }

  /**
   * Whether a username token belongs to an account other than `excludeId`
   */
  tokenTaken(usernameToken: string, excludeId: number = 0): boolean {
    return guardSql('check username', () => {
      const row = this.db
        .prepare<[string, number], { id: number }>('SELECT id FROM users WHERE username_token = ? AND id != ?')
        .get(usernameToken, excludeId);
      return row !== undefined;
    });
  }

  all(): UserRow[] {
    return guardSql('list users', () => this.db.prepare<[], UserRow>(`${SELECT} ORDER BY id`).all());
  }

  update(id: number, changes: UserRowChanges): boolean {
    const sets = assignments(COLUMNS, changes);
    if (sets.length === 0) {
      return this.findById(id) !== null;
    }

    return guardSql('update user', () => {
      const result = this.db
        .prepare<UserRowChanges & { id: number }>(`UPDATE users SET ${sets.join(', ')} WHERE id = @id`)
        .run({ ...changes, id });
      return result.changes > 0;
    });
  }

  delete(id: number): boolean {
    return guardSql('delete user', () => this.db.prepare<[number]>('DELETE FROM users WHERE id = ?').run(id).changes > 0);
  }
}
