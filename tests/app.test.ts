import { describe, test, expect, afterEach } from 'vitest';
import { createFleetVault, type FleetVault } from '../src/app';
import { loadConfig } from '../src/config';
import { generateSecret } from '../src/crypto/key-material';
import { createSilentLogger } from '../src/telemetry/logger';
import { FakeBackupCatalog, unwrap, validVehicle } from './helpers';

describe('createFleetVault', () => {
  let vault: FleetVault | null = null;

  afterEach(() => {
    vault?.close();
    vault = null;
  });

  async function open(): Promise<FleetVault> {
    const config = loadConfig({
      FLEETVAULT_DB_PATH: ':memory:',
      FLEETVAULT_OWNER_PASSWORD: 'test-secret',
      FLEETVAULT_BCRYPT_ROUNDS: '4'
    });
    vault = await createFleetVault(config, {
      catalog: new FakeBackupCatalog(),
      logger: createSilentLogger(),
      secret: generateSecret()
    });
    return vault;
  }

  test('wires login, repositories and the audit trail together', async () => {
    const app = await open();

    const flow = app.createLoginFlow();
    const state = await flow.submit('super_admin', 'test-secret');
    expect(state.status).toBe('authenticated');
    if (state.status !== 'authenticated') return;

    const vehicle = unwrap(await app.vehicles.create(state.session, validVehicle));
    expect(unwrap(await app.vehicles.getAll(state.session))).toEqual([vehicle]);

    const trail = unwrap(await app.audit.list(state.session));
    const descriptions = trail.map((entry) => (entry.ok ? entry.value.description : null));
    expect(descriptions).toEqual(['Viewed vehicle list', 'New vehicle added', 'Logged in']);
  });

  test('the owner credential comes from configuration', async () => {
    const app = await open();
    const outcome = await app.authenticator.authenticate('super_admin', 'Admin_123?');
    expect(outcome.ok).toBe(false);
  });
});
