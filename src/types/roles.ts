// =============================================================================
// COURSEWORK — Role Definitions
//
// Three closed roles. A principal holds exactly one, assigned at
// registration and changed only through an admin operation.
// =============================================================================

/** All roles in the system */
export const ROLES = ['teacher', 'student', 'admin'] as const;

export type Role = (typeof ROLES)[number];

/** Roles a visitor may pick for themselves when registering */
export const SELF_SERVICE_ROLES = ['teacher', 'student'] as const satisfies readonly Role[];

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLES.some((r) => r === value);
}

/** Exhaustiveness helper for switches over closed unions */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
