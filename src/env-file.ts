const NEEDS_QUOTES = /[ \t\n"'\\$]/;

/** Quote and escape a value for a dotenv file when it contains shell-sensitive characters. */
export function formatEnvValue(value: string): string {
  if (!NEEDS_QUOTES.test(value)) {
    return value;
  }
  // Backslash first so later substitutions are not escaped twice.
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\$/g, '\\$');
  return `"${escaped}"`;
}

/**
 * Render secrets as `.env` content, one `KEY=value` line each, in the order given.
 *
 * @example
 * ```ts
 * formatEnvFile([{ key: 'GREETING', value: 'hello world' }]);
 * // 'GREETING="hello world"\n'
 * ```
 */
export function formatEnvFile(secrets: ReadonlyArray<{ key: string; value: string }>): string {
  return secrets.map((secret) => `${secret.key}=${formatEnvValue(secret.value)}\n`).join('');
}
