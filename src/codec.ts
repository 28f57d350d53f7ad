import type { z } from 'zod';
import { KeyEnvError } from './errors.js';
import type { DefaultPermissionInput, PermissionInput } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strip the response envelope: `{ data: ... }` first, then the named
 * resource key (`{ secrets: [...] }`). A bare payload passes through.
 */
export function unwrap(payload: unknown, resourceKey?: string): unknown {
  let current = payload;
  if (isRecord(current) && 'data' in current) {
    current = current.data;
  }
  if (resourceKey !== undefined && isRecord(current) && resourceKey in current) {
    current = current[resourceKey];
  }
  return current;
}

/** Parse a success response body, unwrap it and validate it against `schema`. */
export function decode<S extends z.ZodTypeAny>(body: string, schema: S, resourceKey?: string): z.infer<S> {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new KeyEnvError(`Failed to parse response: ${reason}`, 0, undefined, undefined, { cause: error });
  }

  const result = schema.safeParse(unwrap(payload, resourceKey));
  if (!result.success) {
    const reason = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new KeyEnvError(`Failed to parse response: ${reason}`, 0, undefined, undefined, { cause: result.error });
  }
  return result.data;
}

export function encodePermissionInputs(permissions: PermissionInput[]): Array<{ user_id: string; role: string }> {
  return permissions.map((p) => ({ user_id: p.userId, role: p.role }));
}

export function encodeDefaultPermissions(
  defaults: DefaultPermissionInput[],
): Array<{ environment_name: string; default_role: string }> {
  return defaults.map((d) => ({ environment_name: d.environmentName, default_role: d.defaultRole }));
}
