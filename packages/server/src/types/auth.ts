/**
 * Authentication and authorization types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Without either configured the API runs unsecured and every caller
 * acts as an admin of the tenant named in X-Tenant-Id.
 *
 * Role hierarchy: admin > operator > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export const ROLES = ["admin", "operator", "viewer"] as const;

export type Role = (typeof ROLES)[number];

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

const ROLE_SET = new Set<string>(ROLES);

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "unsecured";
  readonly identity: string;
  readonly role: Role;
  /** Empty when no tenant was selected */
  readonly tenantId: string;
  /** The user recorded in audit fields */
  readonly userId: string;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly tenantId: string;
  readonly userId: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  /** User ID */
  readonly sub: string;
  readonly role: Role;
  readonly tenantId: string;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
