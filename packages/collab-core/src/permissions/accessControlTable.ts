/**
 * Collaboration Permissions - Access Control Table
 *
 * Per-document map of user -> role. Pure data plus the role comparison;
 * it neither logs nor publishes events.
 */

import { type AccessControlEntry, type Role, compareRoles, satisfiesRole } from "./types";

export class AccessControlTable {
  readonly documentId: string;

  /** Map of userId -> role */
  private roles = new Map<string, Role>();

  constructor(documentId: string, initial: Iterable<[string, Role]> = []) {
    this.documentId = documentId;
    for (const [userId, role] of initial) {
      this.roles.set(userId, role);
    }
  }

  /**
   * Insert or replace a user's role.
   * @returns The previous role, or undefined if the user had none
   */
  grant(userId: string, role: Role): Role | undefined {
    const previous = this.roles.get(userId);
    this.roles.set(userId, role);
    return previous;
  }

  getRole(userId: string): Role | undefined {
    return this.roles.get(userId);
  }

  /**
   * Check if a user meets the required role. Unknown users never do.
   */
  hasAccess(userId: string, requiredRole: Role): boolean {
    const role = this.roles.get(userId);
    if (!role) {
      return false;
    }
    return satisfiesRole(role, requiredRole);
  }

  owners(): string[] {
    return Array.from(this.roles.entries())
      .filter(([, role]) => role === "owner")
      .map(([userId]) => userId);
  }

  /**
   * Plain entries, highest role first.
   */
  entries(): AccessControlEntry[] {
    return Array.from(this.roles.entries())
      .map(([userId, role]) => ({ documentId: this.documentId, userId, role }))
      .sort((a, b) => compareRoles(b.role, a.role));
  }

  get size(): number {
    return this.roles.size;
  }
}
