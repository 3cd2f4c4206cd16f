// =============================================================================
// COURSEWORK — Authorization Guard
//
// Pure decision functions. Each throws PermissionDenied or returns; none
// touches a store. Callers evaluate the guard strictly before any write,
// so a denial never leaves a partial mutation behind.
//
// Composition: authorize(principal, ...requirements) checks in order and
// stops at the first failure.
// =============================================================================

import { PermissionDenied } from '../errors';
import { Role, assertNever } from '../types/roles';

/** The part of a principal the guard looks at */
export interface GuardSubject {
  id: string;
  role: Role;
}

/** Anything with an owner */
export interface Owned {
  ownerId: string;
}

export type Operation =
  | 'assignment.read'
  | 'assignment.create'
  | 'assignment.import'
  | 'assignment.update'
  | 'assignment.delete'
  | 'submission.create'
  | 'submission.list'
  | 'submission.notify'
  | 'principal.list'
  | 'principal.assignRole'
  | 'audit.read';

const ALL_ROLES: ReadonlySet<Role> = new Set<Role>(['teacher', 'student', 'admin']);
const AUTHORS: ReadonlySet<Role> = new Set<Role>(['teacher', 'admin']);
const ADMINS: ReadonlySet<Role> = new Set<Role>(['admin']);

/**
 * Roles allowed to attempt each operation. Ownership, where it applies,
 * is checked separately with requireOwnership.
 */
export const OPERATION_ROLES: Record<Operation, ReadonlySet<Role>> = {
  'assignment.read':      ALL_ROLES,
  'assignment.create':    AUTHORS,
  'assignment.import':    AUTHORS,
  'assignment.update':    AUTHORS,
  'assignment.delete':    AUTHORS,
  // Submitting is open to everyone: submitter and owner are different people
  'submission.create':    ALL_ROLES,
  'submission.list':      AUTHORS,
  'submission.notify':    AUTHORS,
  'principal.list':       ADMINS,
  'principal.assignRole': ADMINS,
  'audit.read':           ADMINS,
};

export type Requirement =
  | { kind: 'role'; allowed: ReadonlySet<Role> }
  | { kind: 'operation'; operation: Operation }
  | { kind: 'ownership'; resource: Owned };

/** Whether a role bypasses ownership checks */
export function overridesOwnership(role: Role): boolean {
  switch (role) {
    case 'admin':
      return true;
    case 'teacher':
    case 'student':
      return false;
    default:
      return assertNever(role);
  }
}

/**
 * Deny unless the principal's role is in the allowed set.
 */
export function requireRole(principal: GuardSubject, allowed: ReadonlySet<Role>): void {
  if (!allowed.has(principal.role)) {
    throw new PermissionDenied('Insufficient permissions', {
      required: [...allowed],
      current: principal.role,
    });
  }
}

/**
 * Deny unless the principal owns the resource or is an admin.
 */
export function requireOwnership(principal: GuardSubject, resource: Owned): void {
  if (principal.id === resource.ownerId) return;
  if (overridesOwnership(principal.role)) return;
  throw new PermissionDenied('Only the owner may perform this operation');
}

export function requireOperation(principal: GuardSubject, operation: Operation): void {
  requireRole(principal, OPERATION_ROLES[operation]);
}

export function authorize(principal: GuardSubject, ...requirements: Requirement[]): void {
  for (const requirement of requirements) {
    switch (requirement.kind) {
      case 'role':
        requireRole(principal, requirement.allowed);
        break;
      case 'operation':
        requireOperation(principal, requirement.operation);
        break;
      case 'ownership':
        requireOwnership(principal, requirement.resource);
        break;
      default:
        assertNever(requirement);
    }
  }
}

/** Non-throwing variant for listings and UI hints */
export function isPermitted(principal: GuardSubject, ...requirements: Requirement[]): boolean {
  try {
    authorize(principal, ...requirements);
    return true;
  } catch (err) {
    if (err instanceof PermissionDenied) return false;
    throw err;
  }
}
