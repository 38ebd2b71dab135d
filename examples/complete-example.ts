/**
 * Complete Example: FleetVault end to end
 *
 * This example walks through one working day of the fleet back office:
 * 1. Owner logs in with the configured credential
 * 2. Owner creates an administrator; the administrator creates an operator
 * 3. Vehicles and travellers are registered (traveller PII is encrypted)
 * 4. An operator updates a vehicle in the field and is refused a restricted field
 * 5. Failed logins trip the brute-force detector
 * 6. A backup is made and restored with a single-use restore code
 * 7. The owner reads the decrypted audit trail
 *
 * Runs against an in-memory datastore with a throwaway secret.
 */

import {
  createFleetVault,
  generateSecret,
  isDenied,
  loadConfig,
  type BackupCatalog,
  type Outcome,
  type Role
} from '../src';

/**
 * Backup collaborator that only remembers what it was asked to do
 */
class InMemoryBackupCatalog implements BackupCatalog {
  private readonly backups = new Map<string, { createdBy: string; role: Role; createdAt: string }>();

  async create(meta: { createdBy: string; role: Role; createdAt: string }): Promise<string> {
    const ref = `backup_${this.backups.size + 1}.zip`;
    this.backups.set(ref, meta);
    return ref;
  }

  async exists(backupRef: string): Promise<boolean> {
    return this.backups.has(backupRef);
  }

  async restore(backupRef: string): Promise<void> {
    console.log(`   (catalog) restoring ${backupRef}`);
  }
}

function expectOk<T>(outcome: Outcome<T>, what: string): T {
  if (!outcome.ok) {
    const reason = isDenied(outcome.failure) ? outcome.failure.reason : outcome.failure.message;
    throw new Error(`${what} failed: ${reason}`);
  }
  return outcome.value;
}

async function main() {
  console.log('=== FleetVault Example: Rotterdam e-scooter fleet ===\n');

  const config = loadConfig({
    FLEETVAULT_DB_PATH: ':memory:',
    FLEETVAULT_OWNER_PASSWORD: 'example-Owner-1!',
    FLEETVAULT_BCRYPT_ROUNDS: '4',
    FLEETVAULT_LOG_FORMAT: 'pretty'
  });
  const vault = await createFleetVault(config, {
    catalog: new InMemoryBackupCatalog(),
    secret: generateSecret()
  });

  try {
    // Step 1: Owner login
    console.log('1. Owner logs in...');
    const flow = vault.createLoginFlow();
    const state = await flow.submit('super_admin', 'example-Owner-1!');
    if (state.status !== 'authenticated') {
      throw new Error('Owner login failed');
    }
    const owner = state.session;
    console.log(`   ✓ Logged in as ${owner.identity} (${owner.role})\n`);

    // Step 2: Staff accounts
    console.log('2. Creating staff accounts...');
    expectOk(
      await vault.users.create(owner, {
        username: 'opadmin01',
        password: 'Example-Adm1n!',
        role: 'administrator',
        firstName: 'Anna',
        lastName: 'Jansen'
      }),
      'Create administrator'
    );
    const admin = expectOk(await vault.authenticator.authenticate('opadmin01', 'Example-Adm1n!'), 'Admin login').session;
    expectOk(
      await vault.users.create(admin, {
        username: 'operator1',
        password: 'Example-0perator!',
        role: 'operator',
        firstName: 'Kees',
        lastName: 'de Boer'
      }),
      'Create operator'
    );
    const operator = expectOk(
      await vault.authenticator.authenticate('operator1', 'Example-0perator!'),
      'Operator login'
    ).session;
    console.log('   ✓ Administrator opadmin01 and operator operator1 created\n');

    // Step 3: Vehicles and travellers
    console.log('3. Registering a vehicle and a traveller...');
    const scooter = expectOk(
      await vault.vehicles.create(admin, {
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
      }),
      'Create vehicle'
    );
    const traveller = expectOk(
      await vault.travellers.create(admin, {
        firstName: 'Sanne',
        lastName: 'Visser',
        birthday: '1994-03-21',
        gender: 'female',
        streetName: 'Witte de Withstraat',
        houseNumber: '42',
        zipCode: '3012BP',
        city: 'Rotterdam',
        email: 'sanne@example.com',
        mobilePhone: '12345678',
        drivingLicenseNumber: 'AB1234567'
      }),
      'Create traveller'
    );
    console.log(`   ✓ Vehicle #${scooter.id} ${scooter.serialNumber}`);
    console.log(`   ✓ Traveller #${traveller.id} (phone stored as ${traveller.mobilePhone}, encrypted at rest)\n`);

    // Step 4: Operator in the field
    console.log('4. Operator updates the vehicle...');
    const charged = expectOk(await vault.vehicles.update(operator, scooter.id, { soc: 75, mileage: 12 }), 'SoC update');
    console.log(`   ✓ SoC now ${charged.soc}%`);
    const tuned = await vault.vehicles.update(operator, scooter.id, { topSpeed: 45 });
    if (!tuned.ok && isDenied(tuned.failure)) {
      console.log(`   ✗ Denied: ${tuned.failure.reason}\n`);
    }

    // Step 5: Brute force
    console.log('5. Someone guesses the administrator password...');
    for (let i = 0; i < 3; i++) {
      await vault.authenticator.authenticate('opadmin01', `guess-${i}`);
    }
    console.log(`   ⚠️  Suspicious entries: ${vault.audit.suspiciousCount()}\n`);

    // Step 6: Backup and restore code
    console.log('6. Backup and single-use restore...');
    const backupRef = expectOk(await vault.restoreGrants.createBackup(admin), 'Backup');
    const issued = expectOk(
      await vault.restoreGrants.generateRestoreCode(owner, backupRef, 'opadmin01'),
      'Restore code'
    );
    expectOk(await vault.restoreGrants.redeemRestoreCode(admin, issued.code), 'Redeem');
    const reuse = await vault.restoreGrants.redeemRestoreCode(admin, issued.code);
    console.log(`   ✓ Restored ${backupRef}; second use ${reuse.ok ? 'accepted' : 'refused'}\n`);

    // Step 7: Audit trail
    console.log('7. Owner reads the audit trail (newest first)...');
    const trail = expectOk(await vault.audit.list(owner), 'Audit trail');
    for (const entry of trail.slice(0, 8)) {
      if (entry.ok) {
        const flag = entry.value.suspicious ? '⚠️ ' : '  ';
        console.log(`   ${flag}${entry.value.date} ${entry.value.time} ${entry.value.actor ?? '-'}: ${entry.value.description}`);
      } else {
        console.log(`   #${entry.id}: unreadable (${entry.error.message})`);
      }
    }

    await flow.logout();
    console.log('\n=== Example completed ===');
  } finally {
    vault.close();
  }
}

main().catch((error: unknown) => {
  console.error('Example failed:', error);
  process.exitCode = 1;
});
