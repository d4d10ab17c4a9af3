/**
 * Permissions Module
 *
 * Exports role types and the per-document access control table.
 */

export {
  type Role,
  type AccessControlEntry,
  VALID_ROLES,
  ROLE_RANK,
  isValidRole,
  satisfiesRole,
  compareRoles,
} from "./types";
export { AccessControlTable } from "./accessControlTable";
