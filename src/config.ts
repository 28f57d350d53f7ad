import { z } from 'zod';
import { KeyEnvError } from './errors.js';
import type { Logger } from './logger.js';

export const DEFAULT_BASE_URL = 'https://api.keyenv.dev';
export const DEFAULT_TIMEOUT = 30_000;

/** KeyEnv client configuration options */
export interface KeyEnvOptions {
  /** Service or user token for authentication */
  token: string;
  /** API base URL (default: https://api.keyenv.dev) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Cache TTL in seconds for exportSecrets and everything built on it (default: 0 = disabled) */
  cacheTtl?: number;
  /** Log requests, responses and cache activity at debug level */
  debug?: boolean;
  /** Receives the client's log entries instead of the default stderr logger */
  logger?: Logger;
}

const OptionsSchema = z.object({
  token: z
    .string({ required_error: 'KeyEnv token is required', invalid_type_error: 'KeyEnv token must be a string' })
    .min(1, 'KeyEnv token is required'),
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .default(DEFAULT_BASE_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  timeout: z.number().int().positive('timeout must be a positive number of milliseconds').default(DEFAULT_TIMEOUT),
  cacheTtl: z.number().nonnegative('cacheTtl must not be negative').default(0),
  debug: z.boolean().default(false),
});

export type ResolvedOptions = z.infer<typeof OptionsSchema> & { logger?: Logger };

/** Validate options and apply defaults. Throws before any network access. */
export function resolveOptions(options: KeyEnvOptions): ResolvedOptions {
  const result = OptionsSchema.safeParse(options);
  if (!result.success) {
    throw new KeyEnvError(result.error.issues.map((issue) => issue.message).join('; '), 0, 'invalid_options');
  }
  return { ...result.data, logger: options.logger };
}
