import { AuditTrail } from '../src/audit/audit-trail';
import { CredentialStore } from '../src/crypto/credentials';
import { FieldCodec } from '../src/crypto/field-codec';
import { generateSecret } from '../src/crypto/key-material';
import { createAuthorizationEngine } from '../src/policies/authorization';
import type { RepositoryContext } from '../src/repositories/context';
import { RestoreGrantRepository } from '../src/repositories/restore-grant-repository';
import { TravellerRepository } from '../src/repositories/traveller-repository';
import { UserRepository } from '../src/repositories/user-repository';
import { VehicleRepository } from '../src/repositories/vehicle-repository';
import { Authenticator } from '../src/session/authenticator';
import { LoginFlow } from '../src/session/login-flow';
import { SqliteAuditLog } from '../src/storage/audit-log';
import { openDatabase, type Db } from '../src/storage/database';
import { UserStore } from '../src/storage/user-store';
import { createSilentLogger } from '../src/telemetry/logger';
import type { BackupCatalog, Outcome, Role, Session } from '../src/types';

export const OWNER_USERNAME = 'super_admin';
export const OWNER_PASSWORD = 'test-owner-Secret1!';
export const STAFF_PASSWORD = 'Test-Passw0rd!';

/**
 * In-memory stand-in for the backup packaging collaborator
 */
export class FakeBackupCatalog implements BackupCatalog {
  readonly backups = new Map<string, { createdBy: string; role: Role; createdAt: string }>();
  readonly restored: string[] = [];
  private counter = 0;

  async create(meta: { createdBy: string; role: Role; createdAt: string }): Promise<string> {
    this.counter += 1;
    const ref = `backup_${this.counter}.zip`;
    this.backups.set(ref, meta);
    return ref;
  }

  async exists(backupRef: string): Promise<boolean> {
    return this.backups.has(backupRef);
  }

  async restore(backupRef: string): Promise<void> {
    this.restored.push(backupRef);
  }
}

export interface Harness {
  ctx: RepositoryContext;
  db: Db;
  codec: FieldCodec;
  auditStorage: SqliteAuditLog;
  audit: AuditTrail;
  authenticator: Authenticator;
  users: UserRepository;
  vehicles: VehicleRepository;
  travellers: TravellerRepository;
  restoreGrants: RestoreGrantRepository;
  catalog: FakeBackupCatalog;
  loginFlow(): LoginFlow;
}

export async function createHarness(options: { clock?: () => Date } = {}): Promise<Harness> {
  const db = openDatabase(':memory:');
  const codec = await FieldCodec.fromSecret(generateSecret());
  const logger = createSilentLogger();
  const authorization = createAuthorizationEngine(OWNER_USERNAME);
  const auditStorage = new SqliteAuditLog(db);
  const clock = options.clock ?? (() => new Date());
  const audit = new AuditTrail({ storage: auditStorage, codec, authorization, logger, clock });
  const credentials = new CredentialStore(4);

  const ctx: RepositoryContext = {
    db,
    codec,
    credentials,
    authorization,
    audit,
    logger,
    ownerIdentity: OWNER_USERNAME,
    clock
  };
  const authenticator = new Authenticator({
    users: new UserStore(db),
    codec,
    credentials,
    audit,
    owner: { username: OWNER_USERNAME, password: OWNER_PASSWORD },
    bruteForceWindowMinutes: 10,
    clock
  });
  const catalog = new FakeBackupCatalog();

  return {
    ctx,
    db,
    codec,
    auditStorage,
    audit,
    authenticator,
    users: new UserRepository(ctx),
    vehicles: new VehicleRepository(ctx),
    travellers: new TravellerRepository(ctx),
    restoreGrants: new RestoreGrantRepository(ctx, catalog),
    catalog,
    loginFlow: () => new LoginFlow(authenticator, audit)
  };
}

export function unwrap<T>(outcome: Outcome<T>): T {
  if (!outcome.ok) {
    throw new Error(`Expected success, got failure: ${JSON.stringify(outcome.failure)}`);
  }
  return outcome.value;
}

export async function login(harness: Harness, username: string, password: string): Promise<Session> {
  return unwrap(await harness.authenticator.authenticate(username, password)).session;
}

export async function ownerSession(harness: Harness): Promise<Session> {
  return await login(harness, OWNER_USERNAME, OWNER_PASSWORD);
}

/**
 * Create a staff account as the owner and log in as it
 */
export async function staffSession(
  harness: Harness,
  username: string,
  role: 'administrator' | 'operator'
): Promise<Session> {
  const owner = await ownerSession(harness);
  unwrap(
    await harness.users.create(owner, {
      username,
      password: STAFF_PASSWORD,
      role,
      firstName: 'Test',
      lastName: 'User'
    })
  );
  return await login(harness, username, STAFF_PASSWORD);
}

export function sessionFor(role: Role, identity: string, userId: number = 0): Session {
  return { identity, role, userId, firstName: 'Test', lastName: 'User', startedAt: 0 };
}

export const validVehicle = {
  brand: 'Segway',
  model: 'Ninebot G30',
  serialNumber: 'SN1234567890',
  topSpeed: 25,
  batteryCapacity: 551,
  soc: 50,
  socMin: 20,
  socMax: 80,
  latitude: 51.9225,
  longitude: 4.47917
};

export const validTraveller = {
  firstName: 'jan',
  lastName: 'de vries',
  birthday: '1990-05-17',
  gender: 'Male',
  streetName: 'Coolsingel',
  houseNumber: '12B',
  zipCode: '3011ad',
  city: 'rotterdam',
  email: 'jan@example.com',
  mobilePhone: '12345678',
  drivingLicenseNumber: 'ab1234567'
};
