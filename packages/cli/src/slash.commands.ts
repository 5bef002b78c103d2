import type { StepwiseConfig } from '@stepwise/shared';
import type { AgentEngine } from '@stepwise/core';

// ---------------------------------------------------------------------------
// Slash command registry
// ---------------------------------------------------------------------------

export const SLASH_COMMANDS: Record<string, string> = {
  '/help': 'Show all available commands',
  '/history': 'Search past tasks: /history [query]',
  '/checkpoints': 'List checkpoints of the current task',
  '/restore': 'Restore a checkpoint: /restore <id>',
  '/related': 'List past tasks with a similar context',
  '/context': 'Show the session context',
  '/config': 'Show current configuration',
  '/clear': 'Clear message log',
  '/exit': 'Quit',
};

/** The engine operations slash commands use. */
export type SlashEngine = Pick<
  AgentEngine,
  'state' | 'taskId' | 'searchTaskHistory' | 'listCheckpoints' | 'restoreCheckpoint' | 'getRelatedTasks'
>;

export interface SlashCommandContext {
  config: StepwiseConfig;
  engine: SlashEngine;
}

/** App.tsx resets the message log when it sees this. */
export const CLEAR_SENTINEL = '[clear]';

// ---------------------------------------------------------------------------
// Main dispatcher
// ---------------------------------------------------------------------------

/**
 * Handle a slash command input.
 * Returns a string message to display, 'exit' to quit, or null for no output.
 */
export async function handleSlashCommand(
  input: string,
  ctx: SlashCommandContext,
): Promise<string | 'exit' | null> {
  const [command = '', ...rest] = input.trim().split(/\s+/);
  const args = rest.join(' ');

  switch (command.toLowerCase()) {
    case '/help':
      return formatHelp();

    case '/history':
      return formatHistory(ctx, args);

    case '/checkpoints':
      return formatCheckpoints(ctx);

    case '/restore':
      return restore(ctx, args);

    case '/related':
      return formatRelated(ctx);

    case '/context':
      return formatContext(ctx);

    case '/config':
      return formatConfig(ctx.config);

    case '/clear':
      return CLEAR_SENTINEL;

    case '/exit':
    case '/quit':
      return 'exit';

    default:
      return `Unknown command: ${command}. Type /help for available commands.`;
  }
}

// ---------------------------------------------------------------------------
// Command implementations
// ---------------------------------------------------------------------------

function formatHelp(): string {
  const lines = ['Available commands:', ''];
  for (const [cmd, desc] of Object.entries(SLASH_COMMANDS)) {
    lines.push(`  ${cmd.padEnd(14)} ${desc}`);
  }
  return lines.join('\n');
}

async function formatHistory(ctx: SlashCommandContext, query: string): Promise<string> {
  const entries = await ctx.engine.searchTaskHistory(query);
  if (entries.length === 0) {
    return query ? `No tasks match "${query}".` : 'No task history found.';
  }

  const lines = [query ? `Tasks matching "${query}":` : 'Recent tasks:', ''];
  for (const entry of entries) {
    const mark = entry.completed ? '✓' : '!';
    lines.push(`  ${mark} ${shortId(entry.taskId)}  ${truncate(entry.task, 50)}  (${entry.relevance})`);
  }
  return lines.join('\n');
}

async function formatCheckpoints(ctx: SlashCommandContext): Promise<string> {
  if (!ctx.engine.taskId) return 'No task has run yet.';
  const checkpoints = await ctx.engine.listCheckpoints();
  if (checkpoints.length === 0) return 'No checkpoints for the current task.';

  const lines = ['Checkpoints:', ''];
  for (const cp of checkpoints) {
    lines.push(`  ${cp.id}  ${new Date(cp.timestamp).toISOString()}  ${cp.description}`);
  }
  return lines.join('\n');
}

async function restore(ctx: SlashCommandContext, checkpointId: string): Promise<string> {
  if (!checkpointId) return 'Usage: /restore <checkpoint-id>';
  try {
    const snapshot = await ctx.engine.restoreCheckpoint(checkpointId);
    return `✓ Restored ${checkpointId} (${snapshot.toolExecutions.length} tool executions)`;
  } catch (err) {
    return `Error: ${err instanceof Error ? err.message : String(err)}`;
  }
}

async function formatRelated(ctx: SlashCommandContext): Promise<string> {
  const related = await ctx.engine.getRelatedTasks();
  if (related.length === 0) return 'No related tasks found.';

  const lines = ['Related tasks:', ''];
  for (const task of related) {
    const mark = task.completed ? '✓' : '!';
    lines.push(
      `  ${mark} ${shortId(task.taskId)}  ${truncate(task.description, 50)}  (${task.relevance.toFixed(2)})`,
    );
  }
  return lines.join('\n');
}

function formatContext(ctx: SlashCommandContext): string {
  const context = ctx.engine.state.context;
  if (Object.keys(context).length === 0) return 'Context is empty.';
  return JSON.stringify(context, null, 2);
}

function formatConfig(config: StepwiseConfig): string {
  const shown =
    config.provider.name === 'openai' && config.provider.api_key
      ? { ...config, provider: { ...config.provider, api_key: '***' } }
      : config;
  return JSON.stringify(shown, null, 2);
}

function shortId(taskId: string): string {
  return taskId.slice(0, 8);
}

function truncate(str: string, max: number): string {
  const s = str.replace(/\n/g, ' ').trim();
  return s.length > max ? s.slice(0, max - 1) + '…' : s;
}
