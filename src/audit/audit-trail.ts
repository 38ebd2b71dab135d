/**
 * Audit & Anomaly Trail
 *
 * Encrypts and appends activity entries, flags suspicious ones and watches
 * for repeated failed logins. Writing is best-effort: a failed write goes to
 * the logger and never reaches the caller.
 */

import type { FieldCodec } from '~/crypto/field-codec';
import { describeDenial, type AuthorizationEngine } from '~/policies/authorization';
import { localDate, localTime } from '~/storage/database';
import type { Logger } from '~/telemetry/logger';
import {
  DecryptionError,
  fail,
  succeed,
  type AuditEntry,
  type AuditEventType,
  type AuditLogStorage,
  type AuditRow,
  type Denied,
  type Outcome,
  type Readout,
  type Session
} from '~/types';

export const DEFAULT_FAILURE_WINDOW_MINUTES = 10;
export const FAILURE_THRESHOLD = 3;

export interface RecordOptions {
  suspicious?: boolean;
  /** Defaults to operation-failed for suspicious entries, data-read otherwise */
  eventType?: AuditEventType;
}

export interface AuditTrailOptions {
  storage: AuditLogStorage;
  codec: FieldCodec;
  authorization: AuthorizationEngine;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Identity canonical form shared by recording and counting
 */
function canonicalIdentity(identity: string): string {
  return identity.trim().toLowerCase();
}

export class AuditTrail {
  private readonly storage: AuditLogStorage;
  private readonly codec: FieldCodec;
  private readonly authorization: AuthorizationEngine;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: AuditTrailOptions) {
    this.storage = options.storage;
    this.codec = options.codec;
    this.authorization = options.authorization;
    this.logger = options.logger.child({ component: 'audit' });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Append an entry. Never rejects.
   *
   * @param actor - Username of the caller, or null for system events
   */
  async record(
    actor: string | null,
    description: string,
    extraInfo: string = '',
    options: RecordOptions = {}
  ): Promise<void> {
    const suspicious = options.suspicious ?? false;
    const eventType = options.eventType ?? (suspicious ? 'operation-failed' : 'data-read');
    const now = this.clock();

    try {
      const identity = actor === null ? null : canonicalIdentity(actor);
      const [actorToken, actorCipher, descriptionCipher, extraInfoCipher] = await Promise.all([
        identity === null ? Promise.resolve(null) : this.codec.pseudonymize(identity),
        this.codec.encryptOptional(identity),
        this.codec.encryptDisplay(description),
        this.codec.encryptDisplay(extraInfo)
      ]);

      this.storage.append({
        date: localDate(now),
        time: localTime(now),
        occurredAt: now.getTime(),
        eventType,
        actorToken,
        actorCipher,
        descriptionCipher,
        extraInfoCipher,
        suspicious
      });
    } catch (error) {
      // description and actor may carry PII; only the category is logged
      this.logger.error('Audit entry could not be written', error, { eventType, suspicious });
    }
  }

  /**
   * Record an authorization refusal with required versus actual role
   */
  async recordDenial(actor: string | null, activity: string, denied: Denied): Promise<void> {
    await this.record(actor, `Unauthorized ${activity} attempt`, describeDenial(denied), {
      suspicious: true,
      eventType: 'access-denied'
    });
  }

  async recordLoginAttempt(username: string, success: boolean, reason: string = ''): Promise<void> {
    if (success) {
      await this.record(username, 'Logged in', reason, { eventType: 'login-success' });
      return;
    }
    await this.record(username, 'Unsuccessful login', reason, { suspicious: true, eventType: 'login-failure' });
  }

  /**
   * Whether the identity reached the failed-login threshold within the
   * trailing window. Measured in elapsed milliseconds, so windows that
   * cross midnight count correctly.
   */
  async detectRepeatedFailures(
    identity: string,
    windowMinutes: number = DEFAULT_FAILURE_WINDOW_MINUTES
  ): Promise<boolean> {
    try {
      const token = await this.codec.pseudonymize(canonicalIdentity(identity));
      const since = this.clock().getTime() - windowMinutes * 60_000;
      return this.storage.countSince(token, 'login-failure', since) >= FAILURE_THRESHOLD;
    } catch (error) {
      this.logger.error('Failed-login history could not be read', error);
      return false;
    }
  }

  /**
   * Number of suspicious entries, or null when the trail cannot be read
   */
  suspiciousCount(): number | null {
    try {
      return this.storage.countSuspicious();
    } catch (error) {
      this.logger.error('Suspicious entries could not be counted', error);
      return null;
    }
  }

  /**
   * Decrypted trail, newest first. An entry that fails to decrypt is
   * reported in place and does not hide the others.
   */
  async list(session: Session): Promise<Outcome<Readout<AuditEntry>[]>> {
    const decision = this.authorization.evaluate({
      actor: { role: session.role, identity: session.identity },
      action: 'view-audit-log'
    });
    if (!decision.allowed) {
      await this.recordDenial(session.identity, 'system log access', decision);
      return fail(decision);
    }

    const entries = await Promise.all(this.storage.all().map((row) => this.readRow(row)));
    await this.record(session.identity, 'Viewed system logs', `Entries: ${entries.length}`);
    return succeed(entries);
  }

  private async readRow(row: AuditRow): Promise<Readout<AuditEntry>> {
    try {
      const [actor, description, extraInfo] = await Promise.all([
        row.actorCipher === null ? Promise.resolve(null) : this.codec.decryptDisplay(row.actorCipher),
        this.codec.decryptDisplay(row.descriptionCipher),
        this.codec.decryptDisplay(row.extraInfoCipher)
      ]);
      return {
        ok: true,
        id: row.id,
        value: {
          id: row.id,
          date: row.date,
          time: row.time,
          occurredAt: row.occurredAt,
          eventType: row.eventType,
          actor,
          description,
          extraInfo,
          suspicious: row.suspicious
        }
      };
    } catch (error) {
      if (error instanceof DecryptionError) {
        return { ok: false, id: row.id, error };
      }
      throw error;
    }
  }
}
