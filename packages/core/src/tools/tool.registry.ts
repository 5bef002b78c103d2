import type { Logger } from 'pino';
import type { ToolImpl, ToolCall, ToolResult, ToolContext, ToolDefinition } from './tool.types.js';
import { ToolExecutionError, UnknownToolError } from '../agents/agent.errors.js';
import { silentLogger } from '../logging/logger.js';
import { readFileTool } from './tools/read_file.js';
import { writeFileTool } from './tools/write_file.js';
import { listFilesTool } from './tools/list_files.js';
import { searchFilesTool } from './tools/search_files.js';
import { applyDiffTool } from './tools/apply_diff.js';
import { runCommandTool } from './tools/run_command.js';

export const DEFAULT_TOOLS: readonly ToolImpl[] = [
  readFileTool,
  writeFileTool,
  listFilesTool,
  searchFilesTool,
  applyDiffTool,
  runCommandTool,
];

export class ToolRegistry {
  private tools: Map<string, ToolImpl> = new Map();
  private readonly logger: Logger;

  constructor(tools: readonly ToolImpl[] = DEFAULT_TOOLS, logger?: Logger) {
    this.logger = (logger ?? silentLogger()).child({ component: 'tools' });
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /** Add a tool, replacing any registered under the same name. */
  register(tool: ToolImpl): void {
    this.tools.set(tool.definition.name, tool);
  }

  get(name: string): ToolImpl | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Run a tool call. Throws UnknownToolError for an unregistered name; a tool
   * that throws is reported as a failed result instead.
   */
  async execute(call: ToolCall, ctx: ToolContext): Promise<ToolResult> {
    const impl = this.tools.get(call.tool);
    if (!impl) {
      throw new UnknownToolError(call.tool);
    }

    try {
      return await impl.execute(call.parameters, ctx);
    } catch (err) {
      const error = new ToolExecutionError(call.tool, { cause: err });
      this.logger.warn({ err: error, taskId: ctx.taskId }, 'tool threw');
      return { success: false, message: error.message };
    }
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (tool) => tool.definition);
  }

  /** Returns all registered tool names. */
  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }
}
