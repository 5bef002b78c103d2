import * as fs from 'node:fs/promises';
import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { errorMessage, fail, ok } from '../tool.types.js';
import { numberParam, resolveWithinRoot, stringParam } from './path.utils.js';

export const readFileTool: ToolImpl = {
  definition: {
    name: 'read_file',
    description:
      'Read a text file. Optionally restrict to a line range with start_line/end_line (1-based, inclusive).',
    parameters: {
      path: {
        type: 'string',
        description: 'Path to the file, relative to the working directory.',
        required: true,
      },
      start_line: {
        type: 'number',
        description: 'First line to return (1-based, inclusive).',
        required: false,
      },
      end_line: {
        type: 'number',
        description: 'Last line to return (1-based, inclusive).',
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const filePath = stringParam(params, 'path');
    if (!filePath) return fail('Missing required parameter: path');

    let content: string;
    try {
      content = await fs.readFile(resolveWithinRoot(filePath, ctx.workingDirectory), 'utf-8');
    } catch (err) {
      return fail(`Cannot read file "${filePath}": ${errorMessage(err)}`);
    }

    const startLine = numberParam(params, 'start_line');
    const endLine = numberParam(params, 'end_line');
    if (startLine === undefined && endLine === undefined) {
      return ok(`Read ${filePath}`, content);
    }

    const lines = content.split('\n');
    const from = Math.max(0, (startLine ?? 1) - 1);
    const to = Math.min(endLine ?? lines.length, lines.length);
    if (from >= to) {
      return fail(`Line range ${from + 1}-${to} is empty for ${filePath} (${lines.length} lines)`);
    }
    return ok(`Read ${filePath} lines ${from + 1}-${to}`, lines.slice(from, to).join('\n'));
  },
};
