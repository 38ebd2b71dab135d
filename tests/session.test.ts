import { describe, test, expect, beforeEach } from 'vitest';
import { AuditTrail } from '../src/audit/audit-trail';
import { CredentialStore } from '../src/crypto/credentials';
import { FieldCodec } from '../src/crypto/field-codec';
import { generateSecret } from '../src/crypto/key-material';
import { createAuthorizationEngine } from '../src/policies/authorization';
import { Authenticator } from '../src/session/authenticator';
import { InMemoryAuditLog } from '../src/storage/audit-log';
import { openDatabase } from '../src/storage/database';
import { UserStore } from '../src/storage/user-store';
import { Logger, type LogRecord } from '../src/telemetry/logger';
import { PersistenceError, isDenied } from '../src/types';
import {
  OWNER_PASSWORD,
  OWNER_USERNAME,
  STAFF_PASSWORD,
  createHarness,
  staffSession,
  type Harness
} from './helpers';

class UncountableAuditLog extends InMemoryAuditLog {
  countSuspicious(): number {
    throw new PersistenceError('count suspicious entries failed: SQLITE_IOERR');
  }
}

function suspiciousByType(harness: Harness): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of harness.auditStorage.all()) {
    if (row.suspicious) {
      counts[row.eventType] = (counts[row.eventType] ?? 0) + 1;
    }
  }
  return counts;
}

describe('Authenticator', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  test('the owner logs in with the configured credential', async () => {
    const outcome = await harness.authenticator.authenticate(' Super_Admin ', OWNER_PASSWORD);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.session).toMatchObject({ identity: OWNER_USERNAME, role: 'owner', userId: 0 });
    expect(outcome.value.suspiciousCount).toBe(0);
    expect(harness.auditStorage.all()[0].eventType).toBe('login-success');
  });

  test('staff log in by username, case-insensitively', async () => {
    await staffSession(harness, 'operator1', 'operator');

    const outcome = await harness.authenticator.authenticate('OPERATOR1', STAFF_PASSWORD);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.session).toMatchObject({ identity: 'operator1', role: 'operator', firstName: 'Test' });
    expect(outcome.value.suspiciousCount).toBeNull();
  });

  test('a wrong password and an unknown user get the same refusal', async () => {
    await staffSession(harness, 'operator1', 'operator');

    const wrong = await harness.authenticator.authenticate('operator1', 'Wrong-Passw0rd!');
    const unknown = await harness.authenticator.authenticate('nobody123', 'Wrong-Passw0rd!');

    const refusal = {
      ok: false,
      failure: { allowed: false, reason: 'Invalid username or password', requiredRoles: [], actualRole: null }
    };
    expect(wrong).toEqual(refusal);
    expect(unknown).toEqual(refusal);
  });

  test('three failures record three suspicious failures and exactly one brute-force entry', async () => {
    for (let i = 0; i < 3; i++) {
      await harness.authenticator.authenticate('opadmin01', `Wrong-Passw0rd-${i}`);
    }

    expect(harness.audit.suspiciousCount()).toBe(4);
    expect(suspiciousByType(harness)).toEqual({ 'login-failure': 3, 'brute-force-suspected': 1 });
    expect(await harness.audit.detectRepeatedFailures('opadmin01')).toBe(true);
  });

  test('administrators see the suspicious-entry count after login', async () => {
    await staffSession(harness, 'opadmin01', 'administrator');
    await harness.authenticator.authenticate('opadmin01', 'Wrong-Passw0rd!');

    const outcome = await harness.authenticator.authenticate('opadmin01', STAFF_PASSWORD);
    expect(outcome.ok && outcome.value.suspiciousCount).toBe(1);
  });

  test('requireRole denies and flags a role outside the allowed set', async () => {
    const operator = await staffSession(harness, 'operator1', 'operator');

    const decision = await harness.authenticator.requireRole(operator, ['owner', 'administrator'], 'user management');
    expect(decision).toEqual({
      allowed: false,
      reason: 'user management requires role owner or administrator',
      requiredRoles: ['owner', 'administrator'],
      actualRole: 'operator'
    });
    expect(harness.auditStorage.all()[0]).toMatchObject({ eventType: 'access-denied', suspicious: true });

    expect(await harness.authenticator.requireRole(operator, ['operator'], 'vehicle update')).toEqual({ allowed: true });
  });

  test('logout is audited', async () => {
    const operator = await staffSession(harness, 'operator1', 'operator');
    await harness.authenticator.logout(operator);

    const [latest] = harness.auditStorage.all();
    expect(latest.eventType).toBe('logout');
    expect(await harness.codec.decryptDisplay(latest.descriptionCipher)).toBe('Logged out');
  });

  test('a correct login succeeds when the suspicious count cannot be read', async () => {
    const records: LogRecord[] = [];
    const codec = await FieldCodec.fromSecret(generateSecret());
    const storage = new UncountableAuditLog();
    const audit = new AuditTrail({
      storage,
      codec,
      authorization: createAuthorizationEngine(OWNER_USERNAME),
      logger: new Logger({ level: 'error', sink: (record) => records.push(record) })
    });
    const authenticator = new Authenticator({
      users: new UserStore(openDatabase(':memory:')),
      codec,
      credentials: new CredentialStore(4),
      audit,
      owner: { username: OWNER_USERNAME, password: OWNER_PASSWORD },
      bruteForceWindowMinutes: 10
    });

    const outcome = await authenticator.authenticate(OWNER_USERNAME, OWNER_PASSWORD);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value.session.role).toBe('owner');
    expect(outcome.value.suspiciousCount).toBeNull();
    expect(storage.all()[0].eventType).toBe('login-success');
    expect(records.map((record) => record.message)).toEqual(['Suspicious entries could not be counted']);
    expect(records[0].error).toEqual({
      name: 'PersistenceError',
      message: 'count suspicious entries failed: SQLITE_IOERR',
      code: 'PERSISTENCE_ERROR'
    });
  });
});

describe('LoginFlow', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  test('authenticates on valid credentials', async () => {
    const flow = harness.loginFlow();
    const state = await flow.submit(OWNER_USERNAME, OWNER_PASSWORD);

    expect(state.status).toBe('authenticated');
    expect(flow.state.status === 'authenticated' && flow.state.session.role).toBe('owner');
  });

  test('stays logged out after a failure and reports it', async () => {
    const flow = harness.loginFlow();
    const state = await flow.submit(OWNER_USERNAME, 'Wrong-Passw0rd!');

    expect(state.status).toBe('logged-out');
    if (state.status === 'logged-out') {
      expect(state.failures).toBe(1);
      expect(state.lastFailure && isDenied(state.lastFailure)).toBe(true);
    }
  });

  test('locks after three failures and records the lockout', async () => {
    const flow = harness.loginFlow();
    for (let i = 0; i < 3; i++) {
      await flow.submit('opadmin01', 'Wrong-Passw0rd!');
    }

    expect(flow.state).toEqual({ status: 'locked', failures: 3 });
    expect(harness.audit.suspiciousCount()).toBe(5);
    expect(suspiciousByType(harness)).toEqual({
      'login-failure': 3,
      'brute-force-suspected': 1,
      'login-lockout': 1
    });

    const after = await flow.submit(OWNER_USERNAME, OWNER_PASSWORD);
    expect(after.status).toBe('locked');
    expect(harness.audit.suspiciousCount()).toBe(5);
  });

  test('logout returns to logged-out', async () => {
    const flow = harness.loginFlow();
    await flow.submit(OWNER_USERNAME, OWNER_PASSWORD);
    await flow.logout();

    expect(flow.state).toEqual({ status: 'logged-out', failures: 0 });
    expect(harness.auditStorage.all()[0].eventType).toBe('logout');
  });
});
