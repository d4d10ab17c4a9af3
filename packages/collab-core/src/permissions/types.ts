/**
 * Collaboration Permissions - Type Definitions
 *
 * Roles form a total order: viewer < editor < owner. A role satisfies every
 * requirement at or below its own rank.
 */

/** User role on a shared document */
export type Role = "viewer" | "editor" | "owner";

/** All valid roles, lowest rank first */
export const VALID_ROLES: readonly Role[] = ["viewer", "editor", "owner"] as const;

export const ROLE_RANK: Readonly<Record<Role, number>> = {
  viewer: 0,
  editor: 1,
  owner: 2,
};

/** (documentId, userId) -> role */
export type AccessControlEntry = {
  documentId: string;
  userId: string;
  role: Role;
};

/**
 * Type guard to check if a value is a valid Role
 */
export function isValidRole(value: unknown): value is Role {
  return typeof value === "string" && VALID_ROLES.includes(value as Role);
}

/**
 * Whether `actual` meets the `required` role.
 */
export function satisfiesRole(actual: Role, required: Role): boolean {
  return ROLE_RANK[actual] >= ROLE_RANK[required];
}

/**
 * Compare two roles by rank (negative when `a` ranks below `b`).
 */
export function compareRoles(a: Role, b: Role): number {
  return ROLE_RANK[a] - ROLE_RANK[b];
}
