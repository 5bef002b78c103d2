import * as path from 'node:path';

/**
 * Resolve `filePath` against `root` and verify the result stays inside it.
 * Absolute paths are accepted but validated the same way.
 *
 * @throws Error when the resolved path escapes `root`.
 */
export function resolveWithinRoot(filePath: string, root: string): string {
  const base = path.resolve(root);
  const resolved = path.resolve(base, filePath);

  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    throw new Error(`Path "${filePath}" is outside the working directory`);
  }

  return resolved;
}

/** Read a string parameter, trimmed unless `trim` is false; empty when absent. */
export function stringParam(
  params: Record<string, unknown>,
  name: string,
  { trim = true }: { trim?: boolean } = {},
): string {
  const value = params[name];
  if (value === undefined || value === null) return '';
  return trim ? String(value).trim() : String(value);
}

/** Read a boolean parameter that may arrive as a string from the model. */
export function booleanParam(
  params: Record<string, unknown>,
  name: string,
  fallback: boolean,
): boolean {
  const value = params[name];
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

/** Read a numeric parameter; undefined when absent or not a number. */
export function numberParam(params: Record<string, unknown>, name: string): number | undefined {
  const value = params[name];
  if (value === undefined || value === null || value === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}
