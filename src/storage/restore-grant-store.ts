/**
 * Restore grants table. Only the token of a code is stored, never the code.
 */

import { guardSql, type Db } from './database';

export interface RestoreGrantRow {
  id: number;
  codeToken: string;
  adminToken: string;
  adminCipher: string;
  backupRef: string;
  used: boolean;
  createdAt: string;
  usedAt: string | null;
}

interface RestoreGrantRecord extends Omit<RestoreGrantRow, 'used'> {
  used: number;
}

export type NewRestoreGrantRow = Omit<RestoreGrantRow, 'id' | 'used' | 'usedAt'>;

const SELECT = `
  SELECT id, code_token AS codeToken, admin_token AS adminToken, admin_enc AS adminCipher,
         backup_ref AS backupRef, used, created_at AS createdAt, used_at AS usedAt
  FROM restore_grants`;

function toRow(record: RestoreGrantRecord): RestoreGrantRow {
  return { ...record, used: record.used === 1 };
}

export class RestoreGrantStore {
  constructor(private readonly db: Db) {}

  insert(row: NewRestoreGrantRow): number {
    return guardSql('insert restore grant', () => {
      const result = this.db
        .prepare<NewRestoreGrantRow>(
          `INSERT INTO restore_grants (code_token, admin_token, admin_enc, backup_ref, used, created_at)
           VALUES (@codeToken, @adminToken, @adminCipher, @backupRef, 0, @createdAt)`
        )
        .run(row);
      return Number(result.lastInsertRowid);
    });
  }

  findByCodeToken(codeToken: string): RestoreGrantRow | null {
    return guardSql('read restore grant', () => {
      const record = this.db.prepare<[string], RestoreGrantRecord>(`${SELECT} WHERE code_token = ?`).get(codeToken);
      return record ? toRow(record) : null;
    });
  }

  all(): RestoreGrantRow[] {
    return guardSql('list restore grants', () =>
      this.db.prepare<[], RestoreGrantRecord>(`${SELECT} ORDER BY id`).all().map(toRow)
    );
  }

  /**
   * Mark a grant used. Checking "unused" and setting "used" is one
   * statement; true only for the single caller that flipped the flag.
   */
  consume(codeToken: string, adminToken: string, usedAt: string): boolean {
    return guardSql('consume restore grant', () => {
      const result = this.db
        .prepare<[string, string, string]>(
          'UPDATE restore_grants SET used = 1, used_at = ? WHERE code_token = ? AND admin_token = ? AND used = 0'
        )
        .run(usedAt, codeToken, adminToken);
      return result.changes === 1;
    });
  }
}
