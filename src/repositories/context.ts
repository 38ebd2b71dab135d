/**
 * Collaborators shared by every entity repository, plus the
 * authorize-then-audit steps each operation goes through.
 */

import type { AuditTrail } from '~/audit/audit-trail';
import type { CredentialStore } from '~/crypto/credentials';
import type { FieldCodec } from '~/crypto/field-codec';
import type { AuthorizationEngine, AuthorizationRequest } from '~/policies/authorization';
import type { Db } from '~/storage/database';
import type { Logger } from '~/telemetry/logger';
import {
  ConflictError,
  DecryptionError,
  FleetVaultError,
  NotFoundError,
  ValidationError,
  fail,
  type Denied,
  type Outcome,
  type Readout,
  type Session
} from '~/types';

export interface RepositoryContext {
  db: Db;
  codec: FieldCodec;
  credentials: CredentialStore;
  authorization: AuthorizationEngine;
  audit: AuditTrail;
  logger: Logger;
  /** Reserved username of the owner, lower-case */
  ownerIdentity: string;
  clock: () => Date;
}

type Recoverable = ValidationError | ConflictError | NotFoundError;

function isRecoverable(error: unknown): error is Recoverable {
  return error instanceof ValidationError || error instanceof ConflictError || error instanceof NotFoundError;
}

/**
 * Ask the engine on behalf of the session. A refusal is audited as
 * suspicious and handed back; null means go ahead.
 */
export async function authorize(
  ctx: RepositoryContext,
  session: Session,
  request: Omit<AuthorizationRequest, 'actor'>,
  activity: string
): Promise<Denied | null> {
  const decision = ctx.authorization.evaluate({
    ...request,
    actor: { role: session.role, identity: session.identity }
  });
  if (decision.allowed) {
    return null;
  }
  await ctx.audit.recordDenial(session.identity, activity, decision);
  return decision;
}

/**
 * Turn a recoverable error into a failed outcome, auditing it as
 * suspicious. Anything else is audited by its error code only and
 * propagates.
 */
export async function reject(
  ctx: RepositoryContext,
  session: Session,
  description: string,
  error: unknown
): Promise<Outcome<never>> {
  if (!isRecoverable(error)) {
    const code = error instanceof FleetVaultError ? error.code : 'UNEXPECTED_ERROR';
    await ctx.audit.record(session.identity, description, `Error: ${code}`, { suspicious: true });
    throw error;
  }
  await ctx.audit.record(session.identity, description, error.message, { suspicious: true });
  return fail(error);
}

/**
 * Decrypt one row for display; a DecryptionError is reported for that row only
 */
export async function readout<R extends { id: number }, T>(
  row: R,
  decrypt: (row: R) => Promise<T>
): Promise<Readout<T>> {
  try {
    return { ok: true, id: row.id, value: await decrypt(row) };
  } catch (error) {
    if (error instanceof DecryptionError) {
      return { ok: false, id: row.id, error };
    }
    throw error;
  }
}

/**
 * Case-insensitive substring match over already-decrypted values
 */
export function matchesTerm(term: string, values: ReadonlyArray<string | number | null>): boolean {
  return values.some((value) => value !== null && String(value).toLowerCase().includes(term));
}
