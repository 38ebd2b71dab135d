/**
 * Audit Log Storage Implementations
 *
 * Append-only: neither implementation exposes update or delete.
 */

import { guardSql, toFlag, type Db } from './database';
import type { AuditEventType, AuditLogStorage, AuditRow, NewAuditRow } from '~/types';

interface AuditRecord extends Omit<AuditRow, 'suspicious'> {
  suspicious: number;
}

const SELECT = `
  SELECT id, date, time, occurred_at AS occurredAt, event_type AS eventType,
         actor_token AS actorToken, actor_enc AS actorCipher,
         description_enc AS descriptionCipher, extra_info_enc AS extraInfoCipher, suspicious
  FROM audit_log`;

/**
 * Audit rows in the embedded datastore
 */
export class SqliteAuditLog implements AuditLogStorage {
  constructor(private readonly db: Db) {}

  append(row: NewAuditRow): void {
    guardSql('append audit entry', () => {
      this.db
        .prepare<Omit<AuditRecord, 'id'>>(
          `INSERT INTO audit_log (date, time, occurred_at, event_type, actor_token, actor_enc,
                                  description_enc, extra_info_enc, suspicious)
           VALUES (@date, @time, @occurredAt, @eventType, @actorToken, @actorCipher,
                   @descriptionCipher, @extraInfoCipher, @suspicious)`
        )
        .run({ ...row, suspicious: toFlag(row.suspicious) });
    });
  }

  countSince(actorToken: string, eventType: AuditEventType, since: number): number {
    return guardSql('count audit entries', () => {
      const row = this.db
        .prepare<[string, string, number], { total: number }>(
          'SELECT COUNT(*) AS total FROM audit_log WHERE actor_token = ? AND event_type = ? AND occurred_at >= ?'
        )
        .get(actorToken, eventType, since);
      return row?.total ?? 0;
    });
  }

  countSuspicious(): number {
    return guardSql('count suspicious entries', () => {
      const row = this.db
        .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM audit_log WHERE suspicious = 1')
        .get();
      return row?.total ?? 0;
    });
  }

  all(): AuditRow[] {
    return guardSql('list audit entries', () =>
      this.db
        .prepare<[], AuditRecord>(`${SELECT} ORDER BY id DESC`)
        .all()
        .map((record) => ({ ...record, suspicious: record.suspicious === 1 }))
    );
  }
}

/**
 * In-memory implementation of audit log storage
 *
 * Note: for tests and throwaway sessions; entries are lost with the process
 */
export class InMemoryAuditLog implements AuditLogStorage {
  private entries: AuditRow[] = [];

  append(row: NewAuditRow): void {
    this.entries.push({ ...row, id: this.entries.length + 1 });
  }

  countSince(actorToken: string, eventType: AuditEventType, since: number): number {
    return this.entries.filter(
      (entry) => entry.actorToken === actorToken && entry.eventType === eventType && entry.occurredAt >= since
    ).length;
  }

  countSuspicious(): number {
    return this.entries.filter((entry) => entry.suspicious).length;
  }

  all(): AuditRow[] {
    return [...this.entries].reverse();
  }

  /**
   * Get the total number of entries
   */
  size(): number {
    return this.entries.length;
  }
}
