import { z } from 'zod';
import { TtlCache } from './cache.js';
import { decode, encodeDefaultPermissions, encodePermissionInputs } from './codec.js';
import { resolveOptions, type KeyEnvOptions } from './config.js';
import { formatEnvFile } from './env-file.js';
import { isNotFoundError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import {
  BulkImportResultSchema,
  CurrentUserResponseSchema,
  DefaultPermissionSchema,
  EnvironmentSchema,
  MyPermissionsResponseSchema,
  PermissionSchema,
  ProjectSchema,
  SecretHistorySchema,
  SecretSchema,
  SecretWithInheritanceSchema,
  SecretWithValueAndInheritanceSchema,
  SecretWithValueSchema,
} from './schemas.js';
import { HttpTransport } from './transport.js';
import type {
  BulkImportOptions,
  BulkImportResult,
  BulkSecretItem,
  CurrentUserResponse,
  DefaultPermission,
  DefaultPermissionInput,
  Environment,
  EnvironmentRole,
  MyPermissionsResponse,
  Permission,
  PermissionInput,
  Project,
  Secret,
  SecretHistory,
  SecretWithInheritance,
  SecretWithValue,
  SecretWithValueAndInheritance,
} from './types.js';

function exportCacheKey(projectId: string, environment: string): string {
  return `secrets:${projectId}:${environment}:export`;
}

function environmentPath(projectId: string, environment: string): string {
  return `/projects/${projectId}/environments/${environment}`;
}

/**
 * KeyEnv API client for managing secrets
 *
 * @example
 * ```ts
 * import { KeyEnvClient } from 'keyenv-client';
 *
 * const client = new KeyEnvClient({ token: process.env.KEYENV_TOKEN ?? '' });
 *
 * // Export all secrets for an environment
 * const secrets = await client.exportSecrets('project-id', 'production');
 * ```
 */
export class KeyEnvClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly exportCache: TtlCache<SecretWithValueAndInheritance[]>;

  constructor(options: KeyEnvOptions) {
    const resolved = resolveOptions(options);
    const baseLogger = resolved.logger ?? createLogger({ level: resolved.debug ? 'debug' : 'warn' });
    this.logger = baseLogger.child({ component: 'keyenv-client' });
    this.transport = new HttpTransport({
      baseUrl: resolved.baseUrl,
      token: resolved.token,
      timeout: resolved.timeout,
      logger: this.logger,
    });
    this.exportCache = new TtlCache(resolved.cacheTtl * 1000);
  }

  // ============================================================================
  // Users
  // ============================================================================

  /** Get the authenticated user or service token */
  async getCurrentUser(): Promise<CurrentUserResponse> {
    return decode(await this.transport.get('/users/me'), CurrentUserResponseSchema);
  }

  /** Validate the token and return the principal it belongs to */
  async validateToken(): Promise<CurrentUserResponse> {
    return this.getCurrentUser();
  }

  // ============================================================================
  // Projects
  // ============================================================================

  /** List all accessible projects */
  async listProjects(): Promise<Project[]> {
    return decode(await this.transport.get('/projects'), z.array(ProjectSchema), 'projects');
  }

  /** Get a project by ID, including its environments */
  async getProject(projectId: string): Promise<Project> {
    return decode(await this.transport.get(`/projects/${projectId}`), ProjectSchema, 'project');
  }

  /** Create a new project */
  async createProject(teamId: string, name: string, description?: string): Promise<Project> {
    const body = await this.transport.post('/projects', { team_id: teamId, name, description });
    return decode(body, ProjectSchema, 'project');
  }

  /** Delete a project */
  async deleteProject(projectId: string): Promise<void> {
    await this.transport.delete(`/projects/${projectId}`);
    this.clearCache(projectId);
  }

  // ============================================================================
  // Environments
  // ============================================================================

  /** List environments in a project */
  async listEnvironments(projectId: string): Promise<Environment[]> {
    const body = await this.transport.get(`/projects/${projectId}/environments`);
    return decode(body, z.array(EnvironmentSchema), 'environments');
  }

  /** Get a single environment by name */
  async getEnvironment(projectId: string, environment: string): Promise<Environment> {
    const body = await this.transport.get(environmentPath(projectId, environment));
    return decode(body, EnvironmentSchema, 'environment');
  }

  /**
   * Create a new environment. Keys it does not define are resolved from
   * `inheritsFrom` when exporting.
   */
  async createEnvironment(projectId: string, name: string, inheritsFrom?: string): Promise<Environment> {
    const body = await this.transport.post(`/projects/${projectId}/environments`, {
      name,
      inherits_from: inheritsFrom,
    });
    return decode(body, EnvironmentSchema, 'environment');
  }

  /** Delete an environment */
  async deleteEnvironment(projectId: string, environment: string): Promise<void> {
    await this.transport.delete(environmentPath(projectId, environment));
    this.clearCache(projectId, environment);
  }

  // ============================================================================
  // Secrets
  // ============================================================================

  /** List secrets in an environment (keys and metadata only) */
  async listSecrets(projectId: string, environment: string): Promise<SecretWithInheritance[]> {
    const body = await this.transport.get(`${environmentPath(projectId, environment)}/secrets`);
    return decode(body, z.array(SecretWithInheritanceSchema), 'secrets');
  }

  /**
   * Export all secrets with their decrypted values, inherited ones included.
   * Results are cached when cacheTtl > 0.
   */
  async exportSecrets(projectId: string, environment: string): Promise<SecretWithValueAndInheritance[]> {
    const cacheKey = exportCacheKey(projectId, environment);
    const cached = this.exportCache.get(cacheKey);
    if (cached) {
      this.logger.debug('cache hit', { key: cacheKey });
      return cached.map((secret) => ({ ...secret }));
    }

    const body = await this.transport.get(`${environmentPath(projectId, environment)}/secrets/export`);
    const secrets = decode(body, z.array(SecretWithValueAndInheritanceSchema), 'secrets');

    if (this.exportCache.enabled) {
      this.logger.debug('cache store', { key: cacheKey, count: secrets.length });
      this.exportCache.set(cacheKey, secrets);
    }
    return secrets.map((secret) => ({ ...secret }));
  }

  /**
   * Export secrets as a key-value object
   * @example
   * ```ts
   * const env = await client.exportSecretsAsObject('project-id', 'production');
   * // { DATABASE_URL: '...', API_KEY: '...' }
   * ```
   */
  async exportSecretsAsObject(projectId: string, environment: string): Promise<Record<string, string>> {
    const secrets = await this.exportSecrets(projectId, environment);
    return Object.fromEntries(secrets.map((s) => [s.key, s.value]));
  }

  /** Get a single secret with its value */
  async getSecret(projectId: string, environment: string, key: string): Promise<SecretWithValue> {
    const body = await this.transport.get(`${environmentPath(projectId, environment)}/secrets/${key}`);
    return decode(body, SecretWithValueSchema, 'secret');
  }

  /** Create a new secret */
  async createSecret(
    projectId: string, environment: string, key: string, value: string, description?: string
  ): Promise<Secret> {
    const body = await this.transport.post(
      `${environmentPath(projectId, environment)}/secrets`,
      { key, value, description },
    );
    this.clearCache(projectId, environment);
    return decode(body, SecretSchema, 'secret');
  }

  /** Update an existing secret's value */
  async updateSecret(
    projectId: string, environment: string, key: string, value: string, description?: string
  ): Promise<Secret> {
    const body = await this.transport.put(
      `${environmentPath(projectId, environment)}/secrets/${key}`,
      { value, description },
    );
    this.clearCache(projectId, environment);
    return decode(body, SecretSchema, 'secret');
  }

  /**
   * Set a secret, creating it if the key does not exist yet.
   *
   * Tries an update first; only a 404 falls back to create. Two callers
   * creating the same new key concurrently both reach the create call and the
   * server decides which one wins.
   */
  async setSecret(
    projectId: string, environment: string, key: string, value: string, description?: string
  ): Promise<Secret> {
    try {
      return await this.updateSecret(projectId, environment, key, value, description);
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
      this.logger.debug('secret not found, creating', { projectId, environment, key });
      return this.createSecret(projectId, environment, key, value, description);
    }
  }

  /** Delete a secret */
  async deleteSecret(projectId: string, environment: string, key: string): Promise<void> {
    await this.transport.delete(`${environmentPath(projectId, environment)}/secrets/${key}`);
    this.clearCache(projectId, environment);
  }

  /** Get secret version history, oldest first as returned by the API */
  async getSecretHistory(projectId: string, environment: string, key: string): Promise<SecretHistory[]> {
    const body = await this.transport.get(`${environmentPath(projectId, environment)}/secrets/${key}/history`);
    return decode(body, z.array(SecretHistorySchema), 'history');
  }

  /**
   * Bulk import secrets. Existing keys are skipped unless `overwrite` is set.
   * @example
   * ```ts
   * await client.bulkImport('project-id', 'development', [
   *   { key: 'DATABASE_URL', value: 'postgres://...' },
   *   { key: 'API_KEY', value: 'sk_...' },
   * ], BulkImportOptions.overwrite);
   * ```
   */
  async bulkImport(
    projectId: string, environment: string, secrets: BulkSecretItem[], options: BulkImportOptions = {}
  ): Promise<BulkImportResult> {
    const body = await this.transport.post(
      `${environmentPath(projectId, environment)}/secrets/bulk`,
      { secrets, overwrite: options.overwrite ?? false },
    );
    this.clearCache(projectId, environment);
    return decode(body, BulkImportResultSchema, 'result');
  }

  /**
   * Copy exported secrets into `target` and return how many were written.
   * The client never touches `process.env` on its own; pass it explicitly.
   * @example
   * ```ts
   * await client.loadEnv('project-id', 'production', process.env);
   * console.log(process.env.DATABASE_URL);
   * ```
   */
  async loadEnv(
    projectId: string, environment: string, target: Record<string, string | undefined>
  ): Promise<number> {
    const secrets = await this.exportSecrets(projectId, environment);
    for (const secret of secrets) {
      target[secret.key] = secret.value;
    }
    return secrets.length;
  }

  /** Generate .env file content from the exported secrets */
  async generateEnvFile(projectId: string, environment: string): Promise<string> {
    return formatEnvFile(await this.exportSecrets(projectId, environment));
  }

  /**
   * Clear the export cache.
   * @param projectId - Clear cache for specific project (optional)
   * @param environment - Clear cache for specific environment (requires projectId)
   */
  clearCache(projectId?: string, environment?: string): void {
    if (projectId === undefined) {
      this.exportCache.clear();
      this.logger.debug('cache cleared');
      return;
    }
    const prefix = environment === undefined
      ? `secrets:${projectId}:`
      : `secrets:${projectId}:${environment}:`;
    const removed = this.exportCache.invalidatePrefix(prefix);
    if (removed > 0) {
      this.logger.debug('cache invalidated', { prefix, removed });
    }
  }

  // ============================================================================
  // Environment Permission Management
  // ============================================================================

  /**
   * List all permissions for an environment.
   * @example
   * ```ts
   * const permissions = await client.listPermissions('project-id', 'production');
   * for (const perm of permissions) {
   *   console.log(`${perm.user_email}: ${perm.role}`);
   * }
   * ```
   */
  async listPermissions(projectId: string, environment: string): Promise<Permission[]> {
    const body = await this.transport.get(`${environmentPath(projectId, environment)}/permissions`);
    return decode(body, z.array(PermissionSchema), 'permissions');
  }

  /** Set a user's role on an environment */
  async setPermission(
    projectId: string, environment: string, userId: string, role: EnvironmentRole
  ): Promise<Permission> {
    const body = await this.transport.put(
      `${environmentPath(projectId, environment)}/permissions/${userId}`,
      { role },
    );
    return decode(body, PermissionSchema, 'permission');
  }

  /** Remove a user's permission on an environment */
  async deletePermission(projectId: string, environment: string, userId: string): Promise<void> {
    await this.transport.delete(`${environmentPath(projectId, environment)}/permissions/${userId}`);
  }

  /**
   * Set roles for several users on one environment in a single request.
   * @example
   * ```ts
   * await client.bulkSetPermissions('project-id', 'production', [
   *   { userId: 'user-1', role: 'write' },
   *   { userId: 'user-2', role: 'read' },
   * ]);
   * ```
   */
  async bulkSetPermissions(
    projectId: string, environment: string, permissions: PermissionInput[]
  ): Promise<Permission[]> {
    const body = await this.transport.put(
      `${environmentPath(projectId, environment)}/permissions`,
      { permissions: encodePermissionInputs(permissions) },
    );
    return decode(body, z.array(PermissionSchema), 'permissions');
  }

  /** The caller's effective permissions on every environment of a project */
  async getMyPermissions(projectId: string): Promise<MyPermissionsResponse> {
    const body = await this.transport.get(`/projects/${projectId}/my-permissions`);
    return decode(body, MyPermissionsResponseSchema);
  }

  /** Default roles granted on a project's environments */
  async getProjectDefaults(projectId: string): Promise<DefaultPermission[]> {
    const body = await this.transport.get(`/projects/${projectId}/permissions/defaults`);
    return decode(body, z.array(DefaultPermissionSchema), 'defaults');
  }

  /**
   * Replace the default roles for a project's environments.
   * @example
   * ```ts
   * await client.setProjectDefaults('project-id', [
   *   { environmentName: 'development', defaultRole: 'write' },
   *   { environmentName: 'production', defaultRole: 'read' },
   * ]);
   * ```
   */
  async setProjectDefaults(projectId: string, defaults: DefaultPermissionInput[]): Promise<DefaultPermission[]> {
    const body = await this.transport.put(
      `/projects/${projectId}/permissions/defaults`,
      { defaults: encodeDefaultPermissions(defaults) },
    );
    return decode(body, z.array(DefaultPermissionSchema), 'defaults');
  }
}
