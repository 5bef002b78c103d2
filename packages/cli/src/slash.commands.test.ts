import { describe, it, expect } from 'vitest';
import type { Checkpoint, RelatedTask, StepwiseConfig, TaskHistoryEntry } from '@stepwise/shared';
import { DEFAULT_CONFIG, CheckpointNotFoundError, TaskState } from '@stepwise/core';
import { handleSlashCommand, CLEAR_SENTINEL, type SlashEngine } from './slash.commands.js';

function makeEngine(overrides: Partial<SlashEngine> = {}): SlashEngine {
  const state = new TaskState();
  return {
    state,
    taskId: 'a1b2c3d4-0000',
    async searchTaskHistory(): Promise<TaskHistoryEntry[]> {
      return [];
    },
    async listCheckpoints(): Promise<Checkpoint[]> {
      return [];
    },
    async restoreCheckpoint(id: string) {
      throw new CheckpointNotFoundError(id);
    },
    async getRelatedTasks(): Promise<RelatedTask[]> {
      return [];
    },
    ...overrides,
  };
}

function run(input: string, engine: SlashEngine = makeEngine(), config: StepwiseConfig = DEFAULT_CONFIG) {
  return handleSlashCommand(input, { config, engine });
}

describe('handleSlashCommand', () => {
  it('lists every command in /help', async () => {
    const output = await run('/help');
    expect(output).toContain('/history');
    expect(output).toContain('/restore');
    expect(output?.split('\n')[0]).toBe('Available commands:');
  });

  it('passes the /history query to the engine', async () => {
    const queries: string[] = [];
    const engine = makeEngine({
      async searchTaskHistory(query) {
        queries.push(query);
        return [{ taskId: 'a1b2c3d4-1111', relevance: 3, task: 'fix the parser', completed: true }];
      },
    });

    const output = await run('/history parser bug', engine);

    expect(queries).toEqual(['parser bug']);
    expect(output).toBe('Tasks matching "parser bug":\n\n  ✓ a1b2c3d4  fix the parser  (3)');
  });

  it('reports empty history', async () => {
    expect(await run('/history')).toBe('No task history found.');
    expect(await run('/history nothing')).toBe('No tasks match "nothing".');
  });

  it('lists checkpoints with ISO timestamps', async () => {
    const engine = makeEngine({
      async listCheckpoints() {
        const state = new TaskState().toSnapshot();
        return [
          { id: 't_1', timestamp: 0, taskId: 't', description: 'After executing tool: echo', state, parentId: null },
        ];
      },
    });

    expect(await run('/checkpoints', engine)).toBe(
      'Checkpoints:\n\n  t_1  1970-01-01T00:00:00.000Z  After executing tool: echo',
    );
  });

  it('says so before any task has run', async () => {
    expect(await run('/checkpoints', makeEngine({ taskId: '' }))).toBe('No task has run yet.');
  });

  it('requires an id for /restore and reports failures', async () => {
    expect(await run('/restore')).toBe('Usage: /restore <checkpoint-id>');
    expect(await run('/restore t_9')).toBe('Error: Checkpoint t_9 not found');
  });

  it('reports a successful /restore', async () => {
    const engine = makeEngine({
      async restoreCheckpoint() {
        const snapshot = new TaskState().toSnapshot();
        snapshot.toolExecutions.push({
          toolName: 'echo',
          args: {},
          result: { success: true, message: 'ok' },
          timestamp: 1,
        });
        return snapshot;
      },
    });
    expect(await run('/restore t_1', engine)).toBe('✓ Restored t_1 (1 tool executions)');
  });

  it('formats related tasks', async () => {
    const engine = makeEngine({
      async getRelatedTasks() {
        return [{ taskId: 'ffffeeee-2222', description: 'tidy docs', relevance: 0.5, completed: false }];
      },
    });
    expect(await run('/related', engine)).toBe('Related tasks:\n\n  ! ffffeeee  tidy docs  (0.50)');
  });

  it('shows the context', async () => {
    const engine = makeEngine();
    expect(await run('/context', engine)).toBe('Context is empty.');
    engine.state.updateContext({ repo: 'demo' });
    expect(await run('/context', engine)).toBe('{\n  "repo": "demo"\n}');
  });

  it('masks the api key in /config', async () => {
    const config: StepwiseConfig = {
      ...DEFAULT_CONFIG,
      provider: { name: 'openai', model: 'gpt-4o-mini', api_key: 'test-secret' },
    };
    const output = await run('/config', makeEngine(), config);
    expect(output).toContain('"api_key": "***"');
    expect(output).not.toContain('test-secret');
  });

  it('handles /clear, /exit and unknown commands', async () => {
    expect(await run('/clear')).toBe(CLEAR_SENTINEL);
    expect(await run('/exit')).toBe('exit');
    expect(await run('/bogus')).toBe('Unknown command: /bogus. Type /help for available commands.');
  });
});
