/**
 * Role-Based Permissions
 *
 * Static role → permission table plus per-identity overrides.
 * Every function here is pure: no lookups, no failure modes.
 */

import type { Identity, UserRole } from "./types";

export const ALL_PERMISSIONS = [
  "users:create",
  "users:read",
  "users:update",
  "users:delete",
  "products:create",
  "products:read",
  "products:update",
  "products:delete",
  "quotes:create",
  "quotes:read",
  "quotes:update",
  "quotes:delete",
  "customers:read",
  "company:manage",
  "analytics:read",
  "system:admin",
] as const;

export type Permission = typeof ALL_PERMISSIONS[number];

const PERMISSION_SET: ReadonlySet<string> = new Set<string>(ALL_PERMISSIONS);

export const ROLE_PERMISSIONS: Record<UserRole, readonly Permission[]> = {
  admin: [
    "users:create", "users:read", "users:update", "users:delete",
    "products:create", "products:read", "products:update", "products:delete",
    "quotes:create", "quotes:read", "quotes:update", "quotes:delete",
    "analytics:read", "system:admin",
  ],
  manager: [
    "users:read", "users:update",
    "products:read", "products:update",
    "quotes:create", "quotes:read", "quotes:update",
    "analytics:read",
  ],
  sales_rep: [
    "products:read",
    "quotes:create", "quotes:read", "quotes:update",
    "customers:read",
  ],
  customer: [
    "products:read",
    "quotes:create", "quotes:read",
  ],
  company_admin: [
    "products:read",
    "quotes:create", "quotes:read", "quotes:update",
    "company:manage",
  ],
};

export function isPermission(value: string): value is Permission {
  return PERMISSION_SET.has(value);
}

function isKnownRole(role: string): role is UserRole {
  return Object.prototype.hasOwnProperty.call(ROLE_PERMISSIONS, role);
}

/**
 * Permissions granted by a role. Unknown roles yield an empty set.
 */
export function permissionsFor(role: string): Set<Permission> {
  if (!isKnownRole(role)) return new Set();
  return new Set(ROLE_PERMISSIONS[role]);
}

/**
 * Role permissions unioned with the identity's custom overrides.
 * Override strings outside the closed permission set are ignored.
 */
export function effectivePermissions(identity: Pick<Identity, "role" | "permissions">): Set<Permission> {
  const granted = permissionsFor(identity.role);
  for (const custom of identity.permissions) {
    if (isPermission(custom)) granted.add(custom);
  }
  return granted;
}

export function hasPermission(
  identity: Pick<Identity, "role" | "permissions">,
  permission: Permission
): boolean {
  return effectivePermissions(identity).has(permission);
}

/**
 * Admins and managers see and mutate every quote and company.
 */
export function isStaff(identity: Pick<Identity, "role">): boolean {
  return identity.role === "admin" || identity.role === "manager";
}
