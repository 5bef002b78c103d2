import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export const MAX_FILES = 500;
const SKIP_DIRS = new Set(['node_modules', '.git', 'dist', '.stepwise']);

/**
 * Collect files under `dir` as paths relative to `root`, sorted, skipping
 * tooling directories and unreadable subdirectories. Stops at MAX_FILES.
 */
export async function walkFiles(
  dir: string,
  root: string,
  options: { recursive: boolean; include?: (name: string) => boolean },
): Promise<string[]> {
  const results: string[] = [];

  async function visit(current: string): Promise<void> {
    if (results.length >= MAX_FILES) return;

    let entries;
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      if (results.length >= MAX_FILES) break;
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        if (options.recursive && !SKIP_DIRS.has(entry.name)) await visit(fullPath);
      } else if (entry.isFile() && (options.include?.(entry.name) ?? true)) {
        results.push(path.relative(root, fullPath));
      }
    }
  }

  await visit(dir);
  return results;
}

/** Fails with a readable message unless `absDir` is an existing directory. */
export async function checkDirectory(absDir: string, label: string): Promise<string | null> {
  try {
    const stat = await fs.stat(absDir);
    return stat.isDirectory() ? null : `"${label}" is not a directory`;
  } catch {
    return `Directory "${label}" does not exist`;
  }
}
