import { describe, test, expect, beforeEach } from 'vitest';
import { AuditTrail } from '../src/audit/audit-trail';
import { FieldCodec } from '../src/crypto/field-codec';
import { generateSecret } from '../src/crypto/key-material';
import { createAuthorizationEngine } from '../src/policies/authorization';
import { InMemoryAuditLog, SqliteAuditLog } from '../src/storage/audit-log';
import { openDatabase } from '../src/storage/database';
import { Logger, createSilentLogger, type LogRecord } from '../src/telemetry/logger';
import { DecryptionError, PersistenceError, type AuditLogStorage } from '../src/types';
import { sessionFor } from './helpers';

describe('AuditTrail', () => {
  let codec: FieldCodec;
  let storage: InMemoryAuditLog;
  let now: Date;
  let trail: AuditTrail;

  beforeEach(async () => {
    codec = await FieldCodec.fromSecret(generateSecret());
    storage = new InMemoryAuditLog();
    now = new Date(2024, 0, 15, 9, 5, 7);
    trail = new AuditTrail({
      storage,
      codec,
      authorization: createAuthorizationEngine(),
      logger: createSilentLogger(),
      clock: () => now
    });
  });

  test('stores ciphertext with separate date and time fields', async () => {
    await trail.record('OpAdmin01', 'Logged in', 'from terminal 3');

    const [row] = storage.all();
    expect(row.date).toBe('2024-01-15');
    expect(row.time).toBe('09:05:07');
    expect(row.occurredAt).toBe(now.getTime());
    expect(row.eventType).toBe('data-read');
    expect(row.suspicious).toBe(false);
    expect(row.descriptionCipher).not.toBe('Logged in');
    expect(await codec.decryptDisplay(row.descriptionCipher)).toBe('Logged in');
    expect(await codec.decryptDisplay(row.extraInfoCipher)).toBe('from terminal 3');
    expect(row.actorCipher === null ? null : await codec.decryptDisplay(row.actorCipher)).toBe('opadmin01');
    expect(row.actorToken).toBe(await codec.pseudonymize('opadmin01'));
  });

  test('system entries have no actor', async () => {
    await trail.record(null, 'Backup schedule ran');

    const [row] = storage.all();
    expect(row.actorToken).toBeNull();
    expect(row.actorCipher).toBeNull();
  });

  test('suspicious entries default to operation-failed', async () => {
    await trail.record('opadmin01', 'Vehicle update failed', 'bad input', { suspicious: true });

    expect(storage.all()[0].eventType).toBe('operation-failed');
    expect(trail.suspiciousCount()).toBe(1);
  });

  test('a failing store never reaches the caller', async () => {
    const records: LogRecord[] = [];
    const broken: AuditLogStorage = {
      append: () => {
        throw new PersistenceError('append audit entry failed: SQLITE_FULL database or disk is full');
      },
      countSince: () => 0,
      countSuspicious: () => 0,
      all: () => []
    };
    const fragile = new AuditTrail({
      storage: broken,
      codec,
      authorization: createAuthorizationEngine(),
      logger: new Logger({ sink: (record) => records.push(record) })
    });

    await expect(fragile.record('opadmin01', 'Logged in')).resolves.toBeUndefined();
    expect(records).toHaveLength(1);
    expect(records[0].level).toBe('error');
    expect(records[0].message).toBe('Audit entry could not be written');
    expect(records[0].error?.name).toBe('PersistenceError');
    expect(records[0].context).toEqual({ component: 'audit', eventType: 'data-read', suspicious: false });
  });

  describe('detectRepeatedFailures', () => {
    async function failLogin(identity: string, at: Date): Promise<void> {
      now = at;
      await trail.recordLoginAttempt(identity, false);
    }

    test('fires at the third failure within the window', async () => {
      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 0, 0));
      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 1, 0));
      expect(await trail.detectRepeatedFailures('opadmin01')).toBe(false);

      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 2, 0));
      expect(await trail.detectRepeatedFailures('opadmin01')).toBe(true);
    });

    test('ignores failures older than the window', async () => {
      await failLogin('opadmin01', new Date(2024, 0, 15, 8, 0, 0));
      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 0, 0));
      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 1, 0));
      expect(await trail.detectRepeatedFailures('opadmin01')).toBe(false);
      expect(await trail.detectRepeatedFailures('opadmin01', 90)).toBe(true);
    });

    test('counts a window that spans midnight', async () => {
      await failLogin('opadmin01', new Date(2024, 0, 15, 23, 55, 0));
      await failLogin('opadmin01', new Date(2024, 0, 15, 23, 58, 0));
      await failLogin('opadmin01', new Date(2024, 0, 16, 0, 1, 0));
      now = new Date(2024, 0, 16, 0, 2, 0);
      expect(await trail.detectRepeatedFailures('opadmin01')).toBe(true);
    });

    test('counts per identity, case-insensitively', async () => {
      await failLogin('OpAdmin01', new Date(2024, 0, 15, 9, 0, 0));
      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 0, 1));
      await failLogin('operator1', new Date(2024, 0, 15, 9, 0, 2));
      expect(await trail.detectRepeatedFailures('OPADMIN01')).toBe(false);

      await failLogin('opadmin01', new Date(2024, 0, 15, 9, 0, 3));
      expect(await trail.detectRepeatedFailures('OPADMIN01')).toBe(true);
    });

    test('successful logins do not count', async () => {
      now = new Date(2024, 0, 15, 9, 0, 0);
      await trail.recordLoginAttempt('opadmin01', true);
      await trail.recordLoginAttempt('opadmin01', true);
      await trail.recordLoginAttempt('opadmin01', true);
      expect(await trail.detectRepeatedFailures('opadmin01')).toBe(false);
    });
  });

  describe('list', () => {
    test('operators may not read the trail, and the attempt is flagged', async () => {
      const outcome = await trail.list(sessionFor('operator', 'operator1', 3));

      expect(outcome.ok).toBe(false);
      const [row] = storage.all();
      expect(row.eventType).toBe('access-denied');
      expect(row.suspicious).toBe(true);
      expect(await codec.decryptDisplay(row.descriptionCipher)).toBe('Unauthorized system log access attempt');
      expect(await codec.decryptDisplay(row.extraInfoCipher)).toBe(
        'Role operator may not perform view-audit-log (required: owner|administrator, actual: operator)'
      );
    });

    test('returns decrypted entries newest first and records the viewing', async () => {
      await trail.record('opadmin01', 'First');
      await trail.record('opadmin01', 'Second', 'extra', { suspicious: true });

      const outcome = await trail.list(sessionFor('owner', 'super_admin'));
      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      const descriptions = outcome.value.map((entry) => (entry.ok ? entry.value.description : null));
      expect(descriptions).toEqual(['Second', 'First']);
      expect(storage.size()).toBe(3);

      const latest = storage.all()[0];
      expect(await codec.decryptDisplay(latest.descriptionCipher)).toBe('Viewed system logs');
      expect(await codec.decryptDisplay(latest.extraInfoCipher)).toBe('Entries: 2');
    });

    test('an undecryptable entry is reported in place', async () => {
      const foreign = await FieldCodec.fromSecret(generateSecret());
      await trail.record('opadmin01', 'Readable');
      storage.append({
        date: '2024-01-15',
        time: '09:05:07',
        occurredAt: now.getTime(),
        eventType: 'data-read',
        actorToken: null,
        actorCipher: null,
        descriptionCipher: await foreign.encryptDisplay('Unreadable'),
        extraInfoCipher: await foreign.encryptDisplay(''),
        suspicious: false
      });

      const outcome = await trail.list(sessionFor('administrator', 'opadmin01', 1));
      expect(outcome.ok).toBe(true);
      if (!outcome.ok) return;

      expect(outcome.value).toHaveLength(2);
      const [bad, good] = outcome.value;
      expect(bad.ok).toBe(false);
      if (!bad.ok) {
        expect(bad.id).toBe(2);
        expect(bad.error).toBeInstanceOf(DecryptionError);
      }
      expect(good.ok && good.value.description).toBe('Readable');
    });
  });
});

describe('SqliteAuditLog', () => {
  test('appends, counts and lists newest first', () => {
    const log = new SqliteAuditLog(openDatabase(':memory:'));
    const base = {
      date: '2024-01-15',
      time: '09:00:00',
      actorCipher: 'cipher',
      descriptionCipher: 'cipher',
      extraInfoCipher: 'cipher'
    };

    log.append({ ...base, occurredAt: 1000, eventType: 'login-failure', actorToken: 'tok-a', suspicious: true });
    log.append({ ...base, occurredAt: 2000, eventType: 'login-failure', actorToken: 'tok-a', suspicious: true });
    log.append({ ...base, occurredAt: 3000, eventType: 'login-failure', actorToken: 'tok-b', suspicious: true });
    log.append({ ...base, occurredAt: 4000, eventType: 'login-success', actorToken: 'tok-a', suspicious: false });

    expect(log.countSince('tok-a', 'login-failure', 0)).toBe(2);
    expect(log.countSince('tok-a', 'login-failure', 1500)).toBe(1);
    expect(log.countSuspicious()).toBe(3);

    const rows = log.all();
    expect(rows.map((row) => row.id)).toEqual([4, 3, 2, 1]);
    expect(rows[0].suspicious).toBe(false);
    expect(rows[1].suspicious).toBe(true);
  });
});
