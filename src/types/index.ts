/**
 * Type definitions for FleetVault - role-gated fleet administration
 *
 * Security Model:
 * - PII is stored as randomized ciphertext; fields that need equality lookup
 *   also carry a deterministic keyed token (tagged-variant storage)
 * - Every mutation or disclosure is gated by a single authorization decision
 * - Every outcome is written to an encrypted, append-only audit trail
 */

/**
 * Staff roles, highest privilege first
 */
export const ROLES = ['owner', 'administrator', 'operator'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Authenticated caller identity, threaded explicitly through every call
 */
export interface Session {
  /** Lower-cased username of the caller */
  readonly identity: string;
  readonly role: Role;
  /** Account id; the owner is not stored and has id 0 */
  readonly userId: number;
  readonly firstName: string;
  readonly lastName: string;
  /** Epoch milliseconds of the successful login */
  readonly startedAt: number;
}

/**
 * Stored staff account (decrypted view)
 */
export interface UserAccount {
  id: number;
  username: string;
  role: Exclude<Role, 'owner'>;
  firstName: string;
  lastName: string;
  createdAt: string;
}

export type Gender = 'male' | 'female';

/**
 * Renter record (decrypted view)
 */
export interface Traveller {
  id: number;
  firstName: string;
  lastName: string;
  birthday: string;
  gender: Gender;
  streetName: string;
  houseNumber: string;
  zipCode: string;
  city: string;
  email: string;
  mobilePhone: string;
  drivingLicenseNumber: string;
  createdAt: string;
}

/**
 * Rentable vehicle. Not PII, stored in plaintext
 */
export interface Vehicle {
  id: number;
  brand: string;
  model: string;
  serialNumber: string;
  topSpeed: number;
  batteryCapacity: number;
  soc: number;
  socMin: number;
  socMax: number;
  latitude: number;
  longitude: number;
  outOfService: boolean;
  mileage: number;
  lastMaintenanceDate: string | null;
  inServiceDate: string;
}

export type VehicleField = Exclude<keyof Vehicle, 'id'>;

/**
 * Audit event categories. Stored in plaintext so that the anomaly
 * detector can count them without decrypting
 */
export type AuditEventType =
  | 'login-success'
  | 'login-failure'
  | 'login-lockout'
  | 'brute-force-suspected'
  | 'logout'
  | 'access-denied'
  | 'data-read'
  | 'data-create'
  | 'data-update'
  | 'data-delete'
  | 'operation-failed'
  | 'credential-change'
  | 'backup'
  | 'restore';

/**
 * Decrypted audit entry
 */
export interface AuditEntry {
  id: number;
  date: string;
  time: string;
  /** Epoch milliseconds */
  occurredAt: number;
  eventType: AuditEventType;
  actor: string | null;
  description: string;
  extraInfo: string;
  suspicious: boolean;
}

/**
 * Audit entry as persisted: every free-text field is ciphertext
 */
export interface AuditRow {
  id: number;
  date: string;
  time: string;
  occurredAt: number;
  eventType: AuditEventType;
  actorToken: string | null;
  actorCipher: string | null;
  descriptionCipher: string;
  extraInfoCipher: string;
  suspicious: boolean;
}

export type NewAuditRow = Omit<AuditRow, 'id'>;

/**
 * Storage interface for audit rows
 */
export interface AuditLogStorage {
  /** Append a row; there is no update or delete */
  append(row: NewAuditRow): void;
  /** Count rows of one event type for an actor token since a point in time */
  countSince(actorToken: string, eventType: AuditEventType, since: number): number;
  countSuspicious(): number;
  /** All rows, newest first */
  all(): AuditRow[];
}

/**
 * Single-use restore authorization
 */
export interface RestoreGrant {
  id: number;
  backupRef: string;
  administrator: string;
  used: boolean;
  createdAt: string;
  usedAt: string | null;
}

/**
 * External backup packaging collaborator
 */
export interface BackupCatalog {
  /** Snapshot the datastore; returns the new backup reference */
  create(meta: { createdBy: string; role: Role; createdAt: string }): Promise<string>;
  exists(backupRef: string): Promise<boolean>;
  restore(backupRef: string): Promise<void>;
}

/**
 * Authorization refusal. An ordinary outcome, never thrown
 */
export interface Denied {
  readonly allowed: false;
  readonly reason: string;
  readonly requiredRoles: readonly Role[];
  /** Null for a caller that has not authenticated */
  readonly actualRole: Role | null;
}

export type Decision = { readonly allowed: true } | Denied;

/**
 * Error types for FleetVault operations
 */
export class FleetVaultError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FleetVaultError';
  }
}

/** Malformed input. Safe to show verbatim to the caller */
export class ValidationError extends FleetVaultError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ConflictError extends FleetVaultError {
  constructor(message: string, public readonly field: string) {
    super(message, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends FleetVaultError {
  constructor(entity: string, public readonly id: number | string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class DecryptionError extends FleetVaultError {
  constructor(message: string) {
    super(message, 'DECRYPTION_ERROR');
    this.name = 'DecryptionError';
  }
}

export class PersistenceError extends FleetVaultError {
  constructor(message: string) {
    super(message, 'PERSISTENCE_ERROR');
    this.name = 'PersistenceError';
  }
}

/** Programmer error, e.g. an unknown role reaching the decision function */
export class InvariantError extends FleetVaultError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantError';
  }
}

export class ConfigurationError extends FleetVaultError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Recoverable failures surfaced to the calling boundary
 */
export type Failure = Denied | ValidationError | ConflictError | NotFoundError;

export type Outcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: Failure };

/**
 * Per-record read result. One undecryptable record does not abort a listing
 */
export type Readout<T> =
  | { readonly ok: true; readonly id: number; readonly value: T }
  | { readonly ok: false; readonly id: number; readonly error: DecryptionError };

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function fail<T>(failure: Failure): Outcome<T> {
  return { ok: false, failure };
}

export function isDenied(failure: Failure): failure is Denied {
  return !(failure instanceof FleetVaultError);
}
