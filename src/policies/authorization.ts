/**
 * Authorization Engine
 *
 * Single source of truth for who may do what. Policies are evaluated in
 * priority order; the first denial wins; with no policies everything is
 * denied. Evaluation is pure and synchronous. A denial is a value, never an
 * exception; an unknown role is a programmer error and throws.
 */

import { ROLES, InvariantError } from '~/types';
import type { Decision, Denied, Role, VehicleField } from '~/types';

export const ACTIONS = [
  'create-admin',
  'create-operator',
  'delete-user',
  'reset-password',
  'update-profile',
  'change-password',
  'view-users',
  'view-pii-list',
  'view-audit-log',
  'view-vehicles',
  'create-vehicle',
  'update-vehicle',
  'delete-vehicle',
  'create-traveller',
  'update-traveller',
  'delete-traveller',
  'create-backup',
  'restore-backup',
  'generate-restore-code',
  'redeem-restore-code'
] as const;

export type Action = (typeof ACTIONS)[number];

export interface Actor {
  role: Role;
  identity: string;
}

/** The staff account an account-level action is aimed at */
export interface TargetAccount {
  identity: string;
  role: Role;
}

export interface AuthorizationRequest {
  actor: Actor;
  action: Action;
  /** Account-level actions default to the actor itself */
  target?: TargetAccount;
  /** Fields touched by an update-vehicle request */
  fields?: readonly string[];
}

/**
 * A policy either lets the request through to the next policy or refuses it
 */
export type PolicyVerdict =
  | { pass: true }
  | { pass: false; reason: string; requiredRoles: readonly Role[] };

export interface AuthorizationPolicy {
  id: string;
  name: string;
  evaluate: (request: AuthorizationRequest) => PolicyVerdict;
  /** Higher = evaluated first */
  priority?: number;
}

const PASS: PolicyVerdict = { pass: true };

const STAFF: readonly Role[] = ['owner', 'administrator'];
const EVERYONE: readonly Role[] = ROLES;

/**
 * Roles that may attempt each action at all, before target rules apply
 */
export const ACTION_ROLES: Readonly<Record<Action, readonly Role[]>> = {
  'create-admin': ['owner'],
  'create-operator': STAFF,
  'delete-user': STAFF,
  'reset-password': STAFF,
  'update-profile': EVERYONE,
  'change-password': EVERYONE,
  'view-users': STAFF,
  'view-pii-list': STAFF,
  'view-audit-log': STAFF,
  'view-vehicles': EVERYONE,
  'create-vehicle': STAFF,
  'update-vehicle': EVERYONE,
  'delete-vehicle': STAFF,
  'create-traveller': STAFF,
  'update-traveller': STAFF,
  'delete-traveller': STAFF,
  'create-backup': STAFF,
  'restore-backup': ['owner'],
  'generate-restore-code': ['owner'],
  'redeem-restore-code': STAFF
};

/** Vehicle fields an operator may change in the field */
export const OPERATOR_VEHICLE_FIELDS: readonly VehicleField[] = [
  'soc',
  'latitude',
  'longitude',
  'outOfService',
  'mileage',
  'lastMaintenanceDate'
];

const ACCOUNT_ACTIONS: ReadonlySet<Action> = new Set<Action>([
  'delete-user',
  'reset-password',
  'update-profile',
  'change-password'
]);

function targetOf(request: AuthorizationRequest): TargetAccount {
  return request.target ?? { identity: request.actor.identity, role: request.actor.role };
}

function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Authorization engine: priority-ordered policy evaluation
 */
export class AuthorizationEngine {
  private policies: AuthorizationPolicy[];

  constructor(policies: AuthorizationPolicy[] = []) {
    this.policies = [...policies];
    this.sortPolicies();
  }

  addPolicy(policy: AuthorizationPolicy): void {
    this.policies.push(policy);
    this.sortPolicies();
  }

  removePolicy(policyId: string): boolean {
    const initialLength = this.policies.length;
    this.policies = this.policies.filter((p) => p.id !== policyId);
    return this.policies.length < initialLength;
  }

  getPolicies(): AuthorizationPolicy[] {
    return [...this.policies];
  }

  private sortPolicies(): void {
    this.policies.sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0));
  }

  /**
   * Decide a request.
   *
   * @throws {InvariantError} If the actor or target role is not a known role
   */
  evaluate(request: AuthorizationRequest): Decision {
    if (!isRole(request.actor.role)) {
      throw new InvariantError(`Unknown actor role: ${String(request.actor.role)}`);
    }
    if (request.target && !isRole(request.target.role)) {
      throw new InvariantError(`Unknown target role: ${String(request.target.role)}`);
    }

    if (this.policies.length === 0) {
      return deny(request, 'No authorization policies defined', []);
    }

    for (const policy of this.policies) {
      const verdict = policy.evaluate(request);
      if (!verdict.pass) {
        return deny(request, verdict.reason, verdict.requiredRoles);
      }
    }

    return { allowed: true };
  }
}

function deny(request: AuthorizationRequest, reason: string, requiredRoles: readonly Role[]): Denied {
  return { allowed: false, reason, requiredRoles, actualRole: request.actor.role };
}

/**
 * The owner can never be deleted, have its password reset or changed, or
 * have its profile edited; it is not a stored account
 */
export function createOwnerProtectionPolicy(ownerIdentity: string): AuthorizationPolicy {
  return {
    id: 'owner-protection',
    name: 'Owner Protection',
    evaluate: (request) => {
      if (!ACCOUNT_ACTIONS.has(request.action)) return PASS;
      const target = targetOf(request);
      if (target.role === 'owner' || target.identity === ownerIdentity) {
        return {
          pass: false,
          reason: `The owner account is fixed: ${request.action} is not permitted on it`,
          requiredRoles: []
        };
      }
      return PASS;
    },
    priority: 1000
  };
}

/**
 * Which roles may attempt an action at all
 */
export function createRoleMatrixPolicy(
  matrix: Readonly<Record<Action, readonly Role[]>> = ACTION_ROLES
): AuthorizationPolicy {
  return {
    id: 'role-matrix',
    name: 'Role Matrix',
    evaluate: (request) => {
      const allowed = matrix[request.action];
      if (allowed.includes(request.actor.role)) return PASS;
      return {
        pass: false,
        reason: `Role ${request.actor.role} may not perform ${request.action}`,
        requiredRoles: allowed
      };
    },
    priority: 500
  };
}

/**
 * Account-level actions by non-owners: administrators manage operators and
 * themselves, operators only themselves. Password changes are always
 * self-service; resets go through reset-password
 */
export function createAccountHierarchyPolicy(): AuthorizationPolicy {
  return {
    id: 'account-hierarchy',
    name: 'Account Hierarchy',
    evaluate: (request) => {
      if (!ACCOUNT_ACTIONS.has(request.action)) return PASS;

      const target = targetOf(request);
      const isSelf = target.identity === request.actor.identity;

      if (request.action === 'change-password') {
        return isSelf
          ? PASS
          : { pass: false, reason: 'Only the account holder may change a password', requiredRoles: [] };
      }

      switch (request.actor.role) {
        case 'owner':
          return PASS;
        case 'administrator': {
          if (target.role === 'operator') return PASS;
          if (request.action === 'update-profile' && isSelf) return PASS;
          return {
            pass: false,
            reason: `Administrators may ${request.action} only on operator accounts`,
            requiredRoles: ['owner']
          };
        }
        case 'operator':
          return isSelf
            ? PASS
            : {
                pass: false,
                reason: `Operators may ${request.action} only on their own account`,
                requiredRoles: STAFF
              };
        default: {
          const unreachable: never = request.actor.role;
          throw new InvariantError(`Unknown actor role: ${String(unreachable)}`);
        }
      }
    },
    priority: 400
  };
}

/**
 * Operators may only touch the operational subset of vehicle fields
 */
export function createVehicleFieldPolicy(
  permitted: readonly string[] = OPERATOR_VEHICLE_FIELDS
): AuthorizationPolicy {
  return {
    id: 'vehicle-fields',
    name: 'Operator Vehicle Fields',
    evaluate: (request) => {
      if (request.action !== 'update-vehicle' || request.actor.role !== 'operator') return PASS;

      if (!request.fields) {
        return { pass: false, reason: 'Operators must declare the vehicle fields they change', requiredRoles: STAFF };
      }
      const forbidden = request.fields.filter((field) => !permitted.includes(field));
      if (forbidden.length > 0) {
        return {
          pass: false,
          reason: `Operators may not change vehicle field(s): ${forbidden.join(', ')}`,
          requiredRoles: STAFF
        };
      }
      return PASS;
    },
    priority: 300
  };
}

export function createDefaultPolicies(ownerIdentity: string = 'super_admin'): AuthorizationPolicy[] {
  return [
    createOwnerProtectionPolicy(ownerIdentity),
    createRoleMatrixPolicy(),
    createAccountHierarchyPolicy(),
    createVehicleFieldPolicy()
  ];
}

export function createAuthorizationEngine(ownerIdentity?: string): AuthorizationEngine {
  return new AuthorizationEngine(createDefaultPolicies(ownerIdentity));
}

/**
 * Decide a request against the default policy set
 */
export function canPerform(request: AuthorizationRequest, ownerIdentity?: string): Decision {
  return createAuthorizationEngine(ownerIdentity).evaluate(request);
}

/**
 * Render a denial for the audit trail: required versus actual role
 */
export function describeDenial(denied: Denied): string {
  const required = denied.requiredRoles.length > 0 ? denied.requiredRoles.join('|') : 'none';
  return `${denied.reason} (required: ${required}, actual: ${denied.actualRole ?? 'anonymous'})`;
}
