/**
 * Login state machine: logged-out -> authenticated | locked.
 *
 * Bounded retries: after the last allowed failure the flow locks and
 * records a suspicious "maximum attempts" entry. A locked flow accepts no
 * further submissions.
 */

import type { AuditTrail } from '~/audit/audit-trail';
import type { Authenticator } from './authenticator';
import { isDenied, type Denied, type Session } from '~/types';

export const MAX_LOGIN_ATTEMPTS = 3;

export type LoginState =
  | { readonly status: 'logged-out'; readonly failures: number; readonly lastFailure?: Denied }
  | { readonly status: 'authenticated'; readonly session: Session; readonly suspiciousCount: number | null }
  | { readonly status: 'locked'; readonly failures: number };

export class LoginFlow {
  private current: LoginState = { status: 'logged-out', failures: 0 };

  constructor(
    private readonly authenticator: Authenticator,
    private readonly audit: AuditTrail,
    private readonly maxAttempts: number = MAX_LOGIN_ATTEMPTS
  ) {}

  get state(): LoginState {
    return this.current;
  }

  /**
   * Submit credentials. Ignored unless the flow is logged out.
   */
  async submit(username: string, password: string): Promise<LoginState> {
    if (this.current.status !== 'logged-out') {
      return this.current;
    }

    const outcome = await this.authenticator.authenticate(username, password);
    if (outcome.ok) {
      this.current = { status: 'authenticated', ...outcome.value };
      return this.current;
    }

    const failures = this.current.failures + 1;
    if (failures >= this.maxAttempts) {
      await this.audit.record(
        username.trim().toLowerCase(),
        'Maximum login attempts exceeded',
        `Failed attempts: ${failures}`,
        { suspicious: true, eventType: 'login-lockout' }
      );
      this.current = { status: 'locked', failures };
      return this.current;
    }

    const lastFailure = isDenied(outcome.failure) ? outcome.failure : undefined;
    this.current = { status: 'logged-out', failures, lastFailure };
    return this.current;
  }

  /**
   * End an authenticated session and return to logged-out
   */
  async logout(): Promise<void> {
    if (this.current.status !== 'authenticated') {
      return;
    }
    await this.authenticator.logout(this.current.session);
    this.current = { status: 'logged-out', failures: 0 };
  }
}
