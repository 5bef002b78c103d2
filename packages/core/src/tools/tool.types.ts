import type { ToolResult } from '@stepwise/shared';

export type { ToolResult };

export interface ToolParameter {
  type: 'string' | 'number' | 'boolean';
  description: string;
  required: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
}

export interface ToolCall {
  tool: string;
  parameters: Record<string, unknown>;
}

/** Context passed to every tool at execution time */
export interface ToolContext {
  taskId: string;
  /** Root that relative paths resolve against; tools may not leave it. */
  workingDirectory: string;
}

/**
 * A callable tool implementation. Ordinary failures come back as
 * `success: false`; a throw is treated as a tool crash.
 */
export interface ToolImpl {
  definition: ToolDefinition;
  execute(params: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>;
}

export function ok(message: string, data?: unknown): ToolResult {
  return data === undefined ? { success: true, message } : { success: true, message, data };
}

export function fail(message: string): ToolResult {
  return { success: false, message };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
