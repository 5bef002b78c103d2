import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { errorMessage, fail, ok } from '../tool.types.js';
import { booleanParam, resolveWithinRoot, stringParam } from './path.utils.js';

export const writeFileTool: ToolImpl = {
  definition: {
    name: 'write_file',
    description:
      'Create or overwrite a file with the given content. ' +
      'Use apply_diff to change part of an existing file.',
    parameters: {
      path: {
        type: 'string',
        description: 'Path to the file, relative to the working directory.',
        required: true,
      },
      content: {
        type: 'string',
        description: 'Full content to write to the file.',
        required: true,
      },
      create_dirs: {
        type: 'boolean',
        description: 'Create missing parent directories. Default: true.',
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const filePath = stringParam(params, 'path');
    if (!filePath) return fail('Missing required parameter: path');
    const raw = params['content'];
    if (raw === undefined || raw === null) return fail('Missing required parameter: content');
    const content = String(raw);

    try {
      const resolved = resolveWithinRoot(filePath, ctx.workingDirectory);
      if (booleanParam(params, 'create_dirs', true)) {
        await fs.mkdir(path.dirname(resolved), { recursive: true });
      }
      await fs.writeFile(resolved, content, 'utf-8');
      return ok(`Wrote ${Buffer.byteLength(content)} bytes to ${filePath}`);
    } catch (err) {
      return fail(errorMessage(err));
    }
  },
};
