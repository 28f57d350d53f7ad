/**
 * Wire schemas for KeyEnv API payloads.
 *
 * Field names follow the API (snake_case). Objects strip unknown fields, so
 * newer server releases can add fields without breaking older clients.
 */

import { z } from 'zod';

const timestamp = z.string();

// ---- Users and tokens ----

export const UserSchema = z.object({
  id: z.string(),
  email: z.string().nullish(),
  name: z.string().nullish(),
  avatar_url: z.string().nullish(),
  created_at: timestamp.optional(),
});

export const ServiceTokenSchema = z.object({
  id: z.string(),
  name: z.string(),
  project_id: z.string().nullish(),
  project_name: z.string().nullish(),
  permissions: z.array(z.string()).default([]),
  expires_at: timestamp.nullish(),
  created_at: timestamp.optional(),
});

export const CurrentUserResponseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user'), user: UserSchema }),
  z.object({ type: z.literal('service_token'), service_token: ServiceTokenSchema }),
]);

// ---- Projects and environments ----

export const EnvironmentSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  project_id: z.string().nullish(),
  inherits_from_id: z.string().nullish(),
  inherits_from: z.string().nullish(),
  order: z.number().int().optional(),
  created_at: timestamp.optional(),
  updated_at: timestamp.optional(),
});

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().nullish(),
  team_id: z.string().nullish(),
  slug: z.string().optional(),
  created_at: timestamp.optional(),
  updated_at: timestamp.optional(),
  environments: z.array(EnvironmentSchema).optional(),
});

// ---- Secrets ----

export const SecretSchema = z.object({
  id: z.string(),
  key: z.string(),
  environment_id: z.string().nullish(),
  description: z.string().nullish(),
  type: z.string().optional(),
  version: z.number().int().optional(),
  created_at: timestamp.optional(),
  updated_at: timestamp.optional(),
});

export const SecretWithInheritanceSchema = SecretSchema.extend({
  inherited_from: z.string().nullish(),
});

export const SecretWithValueSchema = SecretSchema.extend({
  value: z.string(),
});

export const SecretWithValueAndInheritanceSchema = SecretWithValueSchema.extend({
  inherited_from: z.string().nullish(),
});

export const SecretHistorySchema = z.object({
  id: z.string(),
  secret_id: z.string().nullish(),
  key: z.string().optional(),
  version: z.number().int().optional(),
  changed_by: z.string().nullish(),
  change_type: z.string().nullish(),
  created_at: timestamp.optional(),
});

export const BulkImportResultSchema = z.object({
  created: z.number().int(),
  updated: z.number().int(),
  skipped: z.number().int(),
});

// ---- Permissions ----

export const EnvironmentRoleSchema = z.enum(['none', 'read', 'write', 'admin']);

export const PermissionSchema = z.object({
  id: z.string().optional(),
  user_id: z.string(),
  user_email: z.string().nullish(),
  user_name: z.string().nullish(),
  granted_by: z.string().nullish(),
  environment_id: z.string().nullish(),
  environment_name: z.string().nullish(),
  role: EnvironmentRoleSchema,
  can_write: z.boolean().optional(),
  created_at: timestamp.optional(),
  updated_at: timestamp.optional(),
});

/** The caller's own access to one environment; rows carry no user or row id. */
export const MyPermissionSchema = z.object({
  environment_id: z.string(),
  environment_name: z.string().nullish(),
  role: EnvironmentRoleSchema,
  can_read: z.boolean().default(false),
  can_write: z.boolean().default(false),
  can_admin: z.boolean().default(false),
});

export const MyPermissionsResponseSchema = z.object({
  permissions: z.array(MyPermissionSchema),
  is_team_admin: z.boolean().default(false),
});

export const DefaultPermissionSchema = z.object({
  id: z.string().optional(),
  project_id: z.string().optional(),
  environment_name: z.string(),
  default_role: EnvironmentRoleSchema,
  created_at: timestamp.optional(),
});

// ---- Errors ----

export const ApiErrorSchema = z.object({
  error: z.string().optional(),
  code: z.string().optional(),
  details: z.record(z.unknown()).optional(),
});
