/**
 * Restore Grants and Backups
 *
 * The owner issues a single-use code that binds one administrator to one
 * backup. Redemption flips the grant's used flag in a single conditional
 * UPDATE, so of two concurrent redemptions exactly one succeeds.
 */

import { webcrypto } from 'node:crypto';
import { nowTimestamp } from '~/storage/database';
import { RestoreGrantStore } from '~/storage/restore-grant-store';
import { UserStore } from '~/storage/user-store';
import { parseFields, usernameSchema } from '~/validation/fields';
import { NotFoundError, succeed, ValidationError } from '~/types';
import type { BackupCatalog, Denied, Outcome, RestoreGrant, Session } from '~/types';
import { authorize, reject, type RepositoryContext } from './context';

const CODE_BYTES = 24;

export interface IssuedRestoreCode {
  /** Shown once to the owner; only its token is stored */
  code: string;
  backupRef: string;
  administrator: string;
}

export function generateRestoreCodeValue(): string {
  return Buffer.from(webcrypto.getRandomValues(new Uint8Array(CODE_BYTES))).toString('base64url');
}

export class RestoreGrantRepository {
  private readonly grants: RestoreGrantStore;
  private readonly users: UserStore;

  constructor(
    private readonly ctx: RepositoryContext,
    private readonly catalog: BackupCatalog
  ) {
    this.grants = new RestoreGrantStore(ctx.db);
    this.users = new UserStore(ctx.db);
  }

  private refusal(session: Session, reason: string): Denied {
    return { allowed: false, reason, requiredRoles: ['administrator'], actualRole: session.role };
  }

  private async requireBackup(backupRef: string): Promise<void> {
    if (!backupRef.trim()) {
      throw new ValidationError('Backup reference is required', 'backupRef');
    }
    if (!(await this.catalog.exists(backupRef))) {
      throw new NotFoundError('Backup', backupRef);
    }
  }

  /**
   * Issue a one-time restore code for an administrator
   */
  async generateRestoreCode(
    session: Session,
    backupRef: string,
    administratorUsername: string
  ): Promise<Outcome<IssuedRestoreCode>> {
    const denied = await authorize(this.ctx, session, { action: 'generate-restore-code' }, 'restore code generation');
    if (denied) return { ok: false, failure: denied };

    try {
      const administrator = parseFields(usernameSchema, administratorUsername);
      const adminToken = await this.ctx.codec.pseudonymize(administrator);
      const account = this.users.findByToken(adminToken);
      if (!account || account.role !== 'administrator') {
        throw new NotFoundError('Administrator', administrator);
      }
      await this.requireBackup(backupRef);

      const code = generateRestoreCodeValue();
      const [codeToken, adminCipher] = await Promise.all([
        this.ctx.codec.pseudonymize(code),
        this.ctx.codec.encryptDisplay(administrator)
      ]);
      this.grants.insert({
        codeToken,
        adminToken,
        adminCipher,
        backupRef,
        createdAt: nowTimestamp(this.ctx.clock())
      });

      await this.ctx.audit.record(
        session.identity,
        'Restore code generated',
        `Backup: ${backupRef}, Administrator: ${administrator}`,
        { eventType: 'restore' }
      );
      return succeed({ code, backupRef, administrator });
    } catch (error) {
      return await reject(this.ctx, session, 'Restore code generation failed', error);
    }
  }

  /**
   * Consume a code issued to the calling administrator and restore its backup
   *
   * @returns The restored backup reference
   */
  async redeemRestoreCode(session: Session, code: string): Promise<Outcome<string>> {
    const denied = await authorize(this.ctx, session, { action: 'redeem-restore-code' }, 'restore code use');
    if (denied) return { ok: false, failure: denied };

    const [codeToken, adminToken] = await Promise.all([
      this.ctx.codec.pseudonymize(code.trim()),
      this.ctx.codec.pseudonymize(session.identity)
    ]);

    const grant = this.grants.findByCodeToken(codeToken);
    if (!grant || grant.adminToken !== adminToken) {
      const refusal = this.refusal(session, 'Invalid restore code');
      await this.ctx.audit.record(session.identity, 'Invalid restore code used', '', {
        suspicious: true,
        eventType: 'restore'
      });
      return { ok: false, failure: refusal };
    }

    if (!this.grants.consume(codeToken, adminToken, nowTimestamp(this.ctx.clock()))) {
      const refusal = this.refusal(session, 'Restore code already used');
      await this.ctx.audit.record(session.identity, 'Attempted reuse of restore code', `Backup: ${grant.backupRef}`, {
        suspicious: true,
        eventType: 'restore'
      });
      return { ok: false, failure: refusal };
    }

    await this.catalog.restore(grant.backupRef);
    await this.ctx.audit.record(session.identity, 'Backup restored with restore code', `Backup: ${grant.backupRef}`, {
      eventType: 'restore'
    });
    return succeed(grant.backupRef);
  }

  /**
   * Grants with the administrator decrypted; owner only
   */
  async list(session: Session): Promise<Outcome<RestoreGrant[]>> {
    const denied = await authorize(this.ctx, session, { action: 'generate-restore-code' }, 'restore code listing');
    if (denied) return { ok: false, failure: denied };

    const grants = await Promise.all(
      this.grants.all().map(async (row) => ({
        id: row.id,
        backupRef: row.backupRef,
        administrator: await this.ctx.codec.decryptDisplay(row.adminCipher),
        used: row.used,
        createdAt: row.createdAt,
        usedAt: row.usedAt
      }))
    );
    await this.ctx.audit.record(session.identity, 'Viewed restore codes', `Codes: ${grants.length}`);
    return succeed(grants);
  }

  /**
   * @returns The new backup reference
   */
  async createBackup(session: Session): Promise<Outcome<string>> {
    const denied = await authorize(this.ctx, session, { action: 'create-backup' }, 'backup creation');
    if (denied) return { ok: false, failure: denied };

    const backupRef = await this.catalog.create({
      createdBy: session.identity,
      role: session.role,
      createdAt: nowTimestamp(this.ctx.clock())
    });
    await this.ctx.audit.record(session.identity, 'Backup created', `Backup: ${backupRef}`, { eventType: 'backup' });
    return succeed(backupRef);
  }

  /**
   * Direct restore without a code; owner only
   */
  async restoreBackup(session: Session, backupRef: string): Promise<Outcome<string>> {
    const denied = await authorize(this.ctx, session, { action: 'restore-backup' }, 'backup restore');
    if (denied) return { ok: false, failure: denied };

    try {
      await this.requireBackup(backupRef);
      await this.catalog.restore(backupRef);
      await this.ctx.audit.record(session.identity, 'Backup restored', `Backup: ${backupRef}`, { eventType: 'restore' });
      return succeed(backupRef);
    } catch (error) {
      return await reject(this.ctx, session, 'Backup restore failed', error);
    }
  }
}
