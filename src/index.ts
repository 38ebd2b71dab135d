/**
 * FleetVault - role-gated fleet administration with field-level encryption
 *
 * Staff accounts, renters and vehicles behind a three-tier role model,
 * with encrypted PII, a single authorization decision function and an
 * encrypted audit trail.
 *
 * @packageDocumentation
 */

// Export all type definitions
export * from '~/types';

export { createFleetVault } from '~/app';
export type { FleetVault, FleetVaultOptions } from '~/app';

export { loadConfig } from '~/config';
export type { FleetVaultConfig } from '~/config';

// Export cryptographic primitives
export {
  generateSecret,
  validateSecret,
  deriveFieldKeys,
  loadOrCreateSecret,
  importSecretFromBase64,
  exportSecretToBase64,
  SECRET_SIZE
} from '~/crypto/key-material';
export type { FieldKeys } from '~/crypto/key-material';

export {
  FieldCodec,
  serializeEnvelope,
  deserializeEnvelope,
  ENVELOPE_VERSION,
  IV_SIZE,
  AUTH_TAG_SIZE
} from '~/crypto/field-codec';
export type { DisplayEnvelope } from '~/crypto/field-codec';

export { CredentialStore, matchesFixedCredential, DEFAULT_BCRYPT_ROUNDS } from '~/crypto/credentials';

// Export authorization
export {
  AuthorizationEngine,
  ACTIONS,
  ACTION_ROLES,
  OPERATOR_VEHICLE_FIELDS,
  canPerform,
  describeDenial,
  createAuthorizationEngine,
  createDefaultPolicies,
  createOwnerProtectionPolicy,
  createRoleMatrixPolicy,
  createAccountHierarchyPolicy,
  createVehicleFieldPolicy
} from '~/policies/authorization';
export type {
  Action,
  Actor,
  TargetAccount,
  AuthorizationRequest,
  AuthorizationPolicy,
  PolicyVerdict
} from '~/policies/authorization';

// Export audit
export { AuditTrail, DEFAULT_FAILURE_WINDOW_MINUTES, FAILURE_THRESHOLD } from '~/audit/audit-trail';
export type { RecordOptions, AuditTrailOptions } from '~/audit/audit-trail';
export { SqliteAuditLog, InMemoryAuditLog } from '~/storage/audit-log';

// Export repositories and session
export { UserRepository, generateTemporaryPassword } from '~/repositories/user-repository';
export { VehicleRepository } from '~/repositories/vehicle-repository';
export type { VehicleFilter } from '~/repositories/vehicle-repository';
export { TravellerRepository } from '~/repositories/traveller-repository';
export { RestoreGrantRepository } from '~/repositories/restore-grant-repository';
export type { IssuedRestoreCode } from '~/repositories/restore-grant-repository';
export type { RepositoryContext } from '~/repositories/context';
export { Authenticator, OWNER_USER_ID } from '~/session/authenticator';
export type { LoginSuccess, AuthenticatorOptions } from '~/session/authenticator';
export { LoginFlow, MAX_LOGIN_ATTEMPTS } from '~/session/login-flow';
export type { LoginState } from '~/session/login-flow';

// Export validation
export {
  CITIES,
  SERVICE_AREA,
  parseFields,
  parseSearchTerm,
  assertSocBounds
} from '~/validation/fields';
export type {
  NewUserInput,
  ProfileChanges,
  TravellerInput,
  TravellerChanges,
  VehicleInput,
  VehicleChanges
} from '~/validation/fields';

export { openDatabase } from '~/storage/database';
export { Logger, createSilentLogger } from '~/telemetry/logger';
export type { LogLevel, LogFormat, LogRecord, LoggerOptions } from '~/telemetry/logger';
