import * as fs from 'node:fs/promises';
import { applyPatch } from 'diff';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { errorMessage, fail, ok } from '../tool.types.js';
import { resolveWithinRoot, stringParam } from './path.utils.js';

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export const applyDiffTool: ToolImpl = {
  definition: {
    name: 'apply_diff',
    description:
      'Apply a unified diff to a file. A missing file is treated as empty, so a diff can create one.',
    parameters: {
      path: {
        type: 'string',
        description: 'Path to the file to patch, relative to the working directory.',
        required: true,
      },
      diff: {
        type: 'string',
        description: 'Unified diff (output of `diff -u` or similar).',
        required: true,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const filePath = stringParam(params, 'path');
    const diffText = stringParam(params, 'diff', { trim: false });
    if (!filePath) return fail('Missing required parameter: path');
    if (!diffText.trim()) return fail('Missing required parameter: diff');

    try {
      const resolved = resolveWithinRoot(filePath, ctx.workingDirectory);
      let original = '';
      try {
        original = await fs.readFile(resolved, 'utf-8');
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }

      const patched = applyPatch(original, diffText);
      if (patched === false) {
        return fail('Patch did not apply cleanly; the diff may be stale or malformed');
      }

      await fs.writeFile(resolved, patched, 'utf-8');
      return ok(`Patch applied to ${filePath}`);
    } catch (err) {
      return fail(errorMessage(err));
    }
  },
};
