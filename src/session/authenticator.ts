/**
 * Authentication
 *
 * Verifies credentials and issues immutable Session values. The owner is
 * recognised by its configured credential and never touches the accounts
 * table; everyone else is found by username token and bcrypt-verified.
 */

import type { AuditTrail } from '~/audit/audit-trail';
import { matchesFixedCredential, type CredentialStore } from '~/crypto/credentials';
import type { FieldCodec } from '~/crypto/field-codec';
import type { UserStore } from '~/storage/user-store';
import { fail, succeed } from '~/types';
import type { Decision, Denied, Outcome, Role, Session } from '~/types';

export const OWNER_USER_ID = 0;

export interface LoginSuccess {
  session: Session;
  /** Suspicious-entry count for the warning banner; null for operators or an unreadable trail */
  suspiciousCount: number | null;
}

export interface AuthenticatorOptions {
  users: UserStore;
  codec: FieldCodec;
  credentials: CredentialStore;
  audit: AuditTrail;
  owner: { username: string; password: string };
  bruteForceWindowMinutes: number;
  clock?: () => Date;
}

function loginRefusal(): Denied {
  return {
    allowed: false,
    reason: 'Invalid username or password',
    requiredRoles: [],
    actualRole: null
  };
}

export class Authenticator {
  private readonly options: AuthenticatorOptions;
  private readonly clock: () => Date;

  constructor(options: AuthenticatorOptions) {
    this.options = { ...options, owner: { ...options.owner, username: options.owner.username.toLowerCase() } };
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Check a username/password pair. Every attempt is audited; failures
   * are suspicious and trigger the repeated-failure detector.
   */
  async authenticate(username: string, password: string): Promise<Outcome<LoginSuccess>> {
    const identity = username.trim().toLowerCase();
    const session = await this.verify(identity, password);

    const { audit } = this.options;
    if (!session) {
      await audit.recordLoginAttempt(identity, false, `Username: "${identity}" used with a wrong password`);
      if (await audit.detectRepeatedFailures(identity, this.options.bruteForceWindowMinutes)) {
        await audit.record(
          identity,
          'Multiple failed login attempts detected',
          `Possible brute force within ${this.options.bruteForceWindowMinutes} minutes`,
          { suspicious: true, eventType: 'brute-force-suspected' }
        );
      }
      return fail(loginRefusal());
    }

    await audit.recordLoginAttempt(identity, true);
    const suspiciousCount = session.role === 'operator' ? null : audit.suspiciousCount();
    return succeed({ session, suspiciousCount });
  }

  private async verify(identity: string, password: string): Promise<Session | null> {
    const { owner, users, codec, credentials } = this.options;
    const startedAt = this.clock().getTime();

    if (identity === owner.username) {
      if (!matchesFixedCredential(password, owner.password)) {
        return null;
      }
      return {
        identity,
        role: 'owner',
        userId: OWNER_USER_ID,
        firstName: 'Super',
        lastName: 'Administrator',
        startedAt
      };
    }

    const row = users.findByToken(await codec.pseudonymize(identity));
    if (!row || !(await credentials.verify(password, row.passwordHash))) {
      return null;
    }

    const [firstName, lastName] = await Promise.all([
      codec.decryptDisplay(row.firstNameCipher),
      codec.decryptDisplay(row.lastNameCipher)
    ]);
    return { identity, role: row.role, userId: row.id, firstName, lastName, startedAt };
  }

  /**
   * Gate for outward-facing operations. A refusal is audited as
   * suspicious with the required and actual role.
   */
  async requireRole(session: Session, allowedRoles: readonly Role[], activity: string): Promise<Decision> {
    if (allowedRoles.includes(session.role)) {
      return { allowed: true };
    }
    const denied: Denied = {
      allowed: false,
      reason: `${activity} requires role ${allowedRoles.join(' or ')}`,
      requiredRoles: allowedRoles,
      actualRole: session.role
    };
    await this.options.audit.recordDenial(session.identity, activity, denied);
    return denied;
  }

  async logout(session: Session): Promise<void> {
    await this.options.audit.record(session.identity, 'Logged out', '', { eventType: 'logout' });
  }
}
