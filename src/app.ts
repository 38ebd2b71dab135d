/**
 * Composition root: opens the datastore, loads key material and wires
 * every service to one shared context.
 */

import { AuditTrail } from '~/audit/audit-trail';
import type { FleetVaultConfig } from '~/config';
import { CredentialStore } from '~/crypto/credentials';
import { FieldCodec } from '~/crypto/field-codec';
import { loadOrCreateSecret } from '~/crypto/key-material';
import { createAuthorizationEngine } from '~/policies/authorization';
import type { RepositoryContext } from '~/repositories/context';
import { RestoreGrantRepository } from '~/repositories/restore-grant-repository';
import { TravellerRepository } from '~/repositories/traveller-repository';
import { UserRepository } from '~/repositories/user-repository';
import { VehicleRepository } from '~/repositories/vehicle-repository';
import { Authenticator } from '~/session/authenticator';
import { LoginFlow } from '~/session/login-flow';
import { SqliteAuditLog } from '~/storage/audit-log';
import { openDatabase } from '~/storage/database';
import { UserStore } from '~/storage/user-store';
import { Logger } from '~/telemetry/logger';
import type { BackupCatalog } from '~/types';

export interface FleetVaultOptions {
  /** Snapshot collaborator for backups and restores */
  catalog: BackupCatalog;
  logger?: Logger;
  /** Use this secret instead of reading or creating `config.secretPath` */
  secret?: Uint8Array;
  clock?: () => Date;
}

export interface FleetVault {
  authenticator: Authenticator;
  users: UserRepository;
  vehicles: VehicleRepository;
  travellers: TravellerRepository;
  restoreGrants: RestoreGrantRepository;
  audit: AuditTrail;
  /** Fresh login state machine for one interactive login */
  createLoginFlow(): LoginFlow;
  close(): void;
}

export async function createFleetVault(config: FleetVaultConfig, options: FleetVaultOptions): Promise<FleetVault> {
  const logger = options.logger ?? new Logger({ level: config.log.level, format: config.log.format });
  const clock = options.clock ?? (() => new Date());

  const secret = options.secret ?? (await loadOrCreateSecret(config.secretPath, logger)).secret;
  const codec = await FieldCodec.fromSecret(secret);
  const db = openDatabase(config.databasePath);

  const authorization = createAuthorizationEngine(config.owner.username);
  const audit = new AuditTrail({ storage: new SqliteAuditLog(db), codec, authorization, logger, clock });
  const credentials = new CredentialStore(config.bcryptRounds);

  const ctx: RepositoryContext = {
    db,
    codec,
    credentials,
    authorization,
    audit,
    logger,
    ownerIdentity: config.owner.username,
    clock
  };

  const authenticator = new Authenticator({
    users: new UserStore(db),
    codec,
    credentials,
    audit,
    owner: config.owner,
    bruteForceWindowMinutes: config.bruteForceWindowMinutes,
    clock
  });

  logger.info('FleetVault ready', { database: config.databasePath });

  return {
    authenticator,
    users: new UserRepository(ctx),
    vehicles: new VehicleRepository(ctx),
    travellers: new TravellerRepository(ctx),
    restoreGrants: new RestoreGrantRepository(ctx, options.catalog),
    audit,
    createLoginFlow: () => new LoginFlow(authenticator, audit),
    close: () => {
      db.close();
    }
  };
}
