import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { errorMessage, fail, ok } from '../tool.types.js';
import { booleanParam, resolveWithinRoot, stringParam } from './path.utils.js';
import { checkDirectory, walkFiles } from './walk.js';

export const searchFilesTool: ToolImpl = {
  definition: {
    name: 'search_files',
    description:
      'Find files whose name contains a pattern (case-insensitive). ' +
      'Returns paths relative to the working directory.',
    parameters: {
      pattern: {
        type: 'string',
        description: 'Text the file name must contain.',
        required: true,
      },
      directory: {
        type: 'string',
        description: 'Directory to search. Defaults to the working directory.',
        required: false,
      },
      recursive: {
        type: 'boolean',
        description: 'Descend into subdirectories. Default: true.',
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const pattern = stringParam(params, 'pattern');
    if (!pattern) return fail('Missing required parameter: pattern');
    const directory = stringParam(params, 'directory') || '.';

    let absDir: string;
    try {
      absDir = resolveWithinRoot(directory, ctx.workingDirectory);
    } catch (err) {
      return fail(errorMessage(err));
    }
    const problem = await checkDirectory(absDir, directory);
    if (problem) return fail(problem);

    const needle = pattern.toLowerCase();
    const matches = await walkFiles(absDir, ctx.workingDirectory, {
      recursive: booleanParam(params, 'recursive', true),
      include: (name) => name.toLowerCase().includes(needle),
    });
    return ok(`Found ${matches.length} files matching "${pattern}"`, matches);
  },
};
