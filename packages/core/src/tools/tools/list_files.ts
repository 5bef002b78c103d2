import type { ToolImpl, ToolResult, ToolContext } from '../tool.types.js';
import { errorMessage, fail, ok } from '../tool.types.js';
import { booleanParam, resolveWithinRoot, stringParam } from './path.utils.js';
import { MAX_FILES, checkDirectory, walkFiles } from './walk.js';

export const listFilesTool: ToolImpl = {
  definition: {
    name: 'list_files',
    description:
      'List files in a directory. Returns paths relative to the working directory. ' +
      'Skips node_modules, .git, dist and .stepwise.',
    parameters: {
      directory: {
        type: 'string',
        description: 'Directory to list. Defaults to the working directory.',
        required: false,
      },
      recursive: {
        type: 'boolean',
        description: 'Descend into subdirectories. Default: false.',
        required: false,
      },
    },
  },

  async execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const directory = stringParam(params, 'directory') || '.';

    let absDir: string;
    try {
      absDir = resolveWithinRoot(directory, ctx.workingDirectory);
    } catch (err) {
      return fail(errorMessage(err));
    }
    const problem = await checkDirectory(absDir, directory);
    if (problem) return fail(problem);

    const files = await walkFiles(absDir, ctx.workingDirectory, {
      recursive: booleanParam(params, 'recursive', false),
    });
    const capped = files.length >= MAX_FILES ? ` (capped at ${MAX_FILES})` : '';
    return ok(`Found ${files.length} files in ${directory}${capped}`, files);
  },
};
