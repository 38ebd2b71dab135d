import { describe, test, expect, beforeEach } from 'vitest';
import { NotFoundError, isDenied, type Session } from '../src/types';
import { createHarness, ownerSession, staffSession, unwrap, type Harness } from './helpers';

describe('RestoreGrantRepository', () => {
  let harness: Harness;
  let owner: Session;
  let admin: Session;
  let backupRef: string;

  beforeEach(async () => {
    harness = await createHarness();
    owner = await ownerSession(harness);
    admin = await staffSession(harness, 'opadmin01', 'administrator');
    backupRef = unwrap(await harness.restoreGrants.createBackup(owner));
  });

  test('backups record who made them', () => {
    expect(backupRef).toBe('backup_1.zip');
    expect(harness.catalog.backups.get(backupRef)).toMatchObject({ createdBy: 'super_admin', role: 'owner' });
  });

  test('only the owner issues restore codes', async () => {
    const outcome = await harness.restoreGrants.generateRestoreCode(admin, backupRef, 'opadmin01');
    expect(outcome.ok === false && isDenied(outcome.failure)).toBe(true);
  });

  test('codes are bound to an existing administrator and backup', async () => {
    await staffSession(harness, 'operator1', 'operator');

    const forOperator = await harness.restoreGrants.generateRestoreCode(owner, backupRef, 'operator1');
    expect(forOperator.ok).toBe(false);
    if (!forOperator.ok) {
      expect(forOperator.failure).toBeInstanceOf(NotFoundError);
      expect(forOperator.failure).toMatchObject({ message: 'Administrator operator1 not found' });
    }

    const missingBackup = await harness.restoreGrants.generateRestoreCode(owner, 'backup_9.zip', 'opadmin01');
    expect(missingBackup.ok).toBe(false);
    if (!missingBackup.ok) {
      expect(missingBackup.failure).toMatchObject({ message: 'Backup backup_9.zip not found' });
    }
  });

  test('the code is stored only as a token', async () => {
    const issued = unwrap(await harness.restoreGrants.generateRestoreCode(owner, backupRef, 'opadmin01'));

    const raw = harness.db.prepare<[], { token: string }>('SELECT code_token AS token FROM restore_grants').get();
    expect(raw?.token).not.toBe(issued.code);
    expect(raw?.token).toBe(await harness.codec.pseudonymize(issued.code));
  });

  test('a code redeems once and restores the backup', async () => {
    const { code } = unwrap(await harness.restoreGrants.generateRestoreCode(owner, backupRef, 'opadmin01'));

    expect(await harness.restoreGrants.redeemRestoreCode(admin, code)).toEqual({ ok: true, value: backupRef });
    expect(harness.catalog.restored).toEqual([backupRef]);

    const again = await harness.restoreGrants.redeemRestoreCode(admin, code);
    expect(again.ok).toBe(false);
    if (!again.ok && isDenied(again.failure)) {
      expect(again.failure.reason).toBe('Restore code already used');
    }
    expect(harness.auditStorage.all()[0]).toMatchObject({ suspicious: true, eventType: 'restore' });
  });

  test('concurrent redemption succeeds exactly once', async () => {
    const { code } = unwrap(await harness.restoreGrants.generateRestoreCode(owner, backupRef, 'opadmin01'));

    const results = await Promise.all([
      harness.restoreGrants.redeemRestoreCode(admin, code),
      harness.restoreGrants.redeemRestoreCode(admin, code)
    ]);

    expect(results.filter((result) => result.ok)).toHaveLength(1);
    const losers = results.filter((result) => !result.ok);
    expect(losers).toHaveLength(1);
    expect(losers[0]).toMatchObject({ failure: { allowed: false, reason: 'Restore code already used' } });
    expect(harness.catalog.restored).toEqual([backupRef]);

    const grants = unwrap(await harness.restoreGrants.list(owner));
    expect(grants).toHaveLength(1);
    expect(grants[0]).toMatchObject({ administrator: 'opadmin01', backupRef, used: true });
    expect(grants[0].usedAt).not.toBeNull();
  });

  test('a code cannot be redeemed by another administrator', async () => {
    const { code } = unwrap(await harness.restoreGrants.generateRestoreCode(owner, backupRef, 'opadmin01'));
    const other = await staffSession(harness, 'opadmin02', 'administrator');

    const outcome = await harness.restoreGrants.redeemRestoreCode(other, code);
    expect(outcome).toMatchObject({ ok: false, failure: { reason: 'Invalid restore code' } });
    expect(harness.catalog.restored).toEqual([]);

    expect(await harness.restoreGrants.redeemRestoreCode(admin, code)).toEqual({ ok: true, value: backupRef });
  });

  test('operators may not create backups', async () => {
    const operator = await staffSession(harness, 'operator1', 'operator');
    const outcome = await harness.restoreGrants.createBackup(operator);
    expect(outcome.ok === false && isDenied(outcome.failure)).toBe(true);
  });

  test('only the owner restores a backup directly', async () => {
    const denied = await harness.restoreGrants.restoreBackup(admin, backupRef);
    expect(denied.ok === false && isDenied(denied.failure)).toBe(true);

    expect(await harness.restoreGrants.restoreBackup(owner, backupRef)).toEqual({ ok: true, value: backupRef });
    expect(harness.catalog.restored).toEqual([backupRef]);
  });
});
