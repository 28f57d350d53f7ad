import type { z } from 'zod';
import type {
  BulkImportResultSchema,
  CurrentUserResponseSchema,
  DefaultPermissionSchema,
  EnvironmentRoleSchema,
  EnvironmentSchema,
  MyPermissionSchema,
  MyPermissionsResponseSchema,
  PermissionSchema,
  ProjectSchema,
  SecretHistorySchema,
  SecretSchema,
  SecretWithInheritanceSchema,
  SecretWithValueAndInheritanceSchema,
  SecretWithValueSchema,
  ServiceTokenSchema,
  UserSchema,
} from './schemas.js';

/** Human user account */
export type User = z.infer<typeof UserSchema>;

/** Project-scoped non-human credential */
export type ServiceToken = z.infer<typeof ServiceTokenSchema>;

/** The authenticated principal, tagged by `type` */
export type CurrentUserResponse = z.infer<typeof CurrentUserResponseSchema>;

/** Project, with its environments when the API expands them */
export type Project = z.infer<typeof ProjectSchema>;

/** Environment within a project */
export type Environment = z.infer<typeof EnvironmentSchema>;

/** Secret metadata (no value) */
export type Secret = z.infer<typeof SecretSchema>;

/** Listing view: metadata plus the environment the key is inherited from */
export type SecretWithInheritance = z.infer<typeof SecretWithInheritanceSchema>;

/** Single-secret view with its decrypted value */
export type SecretWithValue = z.infer<typeof SecretWithValueSchema>;

/** Export view: value plus inheritance */
export type SecretWithValueAndInheritance = z.infer<typeof SecretWithValueAndInheritanceSchema>;

/** Secret history entry */
export type SecretHistory = z.infer<typeof SecretHistorySchema>;

/** Bulk import counts */
export type BulkImportResult = z.infer<typeof BulkImportResultSchema>;

/** Environment permission role */
export type EnvironmentRole = z.infer<typeof EnvironmentRoleSchema>;

/** A user's permission on one environment */
export type Permission = z.infer<typeof PermissionSchema>;

/** The caller's role and capabilities on one environment */
export type MyPermission = z.infer<typeof MyPermissionSchema>;

/** Response for the caller's own permissions in a project */
export type MyPermissionsResponse = z.infer<typeof MyPermissionsResponseSchema>;

/** Default role granted on an environment of a project */
export type DefaultPermission = z.infer<typeof DefaultPermissionSchema>;

/** Bulk import request item */
export interface BulkSecretItem {
  key: string;
  value: string;
  description?: string;
}

/** Bulk import behavior for keys that already exist */
export interface BulkImportOptions {
  /** Replace existing values instead of skipping them (default: false) */
  overwrite?: boolean;
}

export const BulkImportOptions = {
  overwrite: { overwrite: true },
  skipExisting: { overwrite: false },
} as const satisfies Record<string, BulkImportOptions>;

/** Role assignment for one user */
export interface PermissionInput {
  userId: string;
  role: EnvironmentRole;
}

/** Default role assignment for one environment */
export interface DefaultPermissionInput {
  environmentName: string;
  defaultRole: EnvironmentRole;
}

/** True when the value was resolved from an ancestor environment */
export function isInherited(secret: { inherited_from?: string | null }): boolean {
  return secret.inherited_from != null && secret.inherited_from !== '';
}

/** True once the token's expiry lies in the past. Tokens without expiry never expire. */
export function isServiceTokenExpired(token: ServiceToken, now: Date = new Date()): boolean {
  if (token.expires_at == null) return false;
  return Date.parse(token.expires_at) < now.getTime();
}

export function bulkImportTotal(result: BulkImportResult): number {
  return result.created + result.updated + result.skipped;
}

export function isUserPrincipal(
  response: CurrentUserResponse,
): response is Extract<CurrentUserResponse, { type: 'user' }> {
  return response.type === 'user';
}

export function isServiceTokenPrincipal(
  response: CurrentUserResponse,
): response is Extract<CurrentUserResponse, { type: 'service_token' }> {
  return response.type === 'service_token';
}
