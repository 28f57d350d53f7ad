export { KeyEnvClient } from './client.js';
export { KeyEnvError, isNotFoundError } from './errors.js';
export { TtlCache } from './cache.js';
export { formatEnvFile, formatEnvValue } from './env-file.js';
export { createLogger, stderrLogHandler } from './logger.js';
export type { Logger, LogEntry, LogHandler, LogLevel, LoggerOptions } from './logger.js';
export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from './config.js';
export type { KeyEnvOptions } from './config.js';
export { SDK_VERSION } from './transport.js';
export {
  BulkImportOptions,
  bulkImportTotal,
  isInherited,
  isServiceTokenExpired,
  isServiceTokenPrincipal,
  isUserPrincipal,
} from './types.js';
export type {
  User,
  ServiceToken,
  CurrentUserResponse,
  Project,
  Environment,
  Secret,
  SecretWithInheritance,
  SecretWithValue,
  SecretWithValueAndInheritance,
  SecretHistory,
  BulkSecretItem,
  BulkImportResult,
  EnvironmentRole,
  Permission,
  PermissionInput,
  MyPermission,
  MyPermissionsResponse,
  DefaultPermission,
  DefaultPermissionInput,
} from './types.js';
