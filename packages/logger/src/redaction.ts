/**
 * Redaction paths for gateway credentials.
 *
 * Identify and resume payloads carry the bot token in `d.token`, and
 * configuration objects carry it at the top level.
 */

export const DEFAULT_REDACT_PATHS: readonly string[] = [
  "token",
  "*.token",
  "d.token",
  "payload.d.token",
  "authorization",
  "headers.authorization",
];

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
  return Array.from(new Set([...DEFAULT_REDACT_PATHS, ...extra]));
}
