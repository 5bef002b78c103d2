import { describe, it, expect, beforeEach } from 'vitest';
import { TaskState } from './task.state.js';

describe('TaskState', () => {
  let clock: number;
  let state: TaskState;

  beforeEach(() => {
    clock = 1_000;
    state = new TaskState(() => clock);
  });

  it('starts a task with a clean per-task record', () => {
    state.startNewTask('write docs', 'task-1');

    expect(state.task).toBe('write docs');
    expect(state.taskId).toBe('task-1');
    expect(state.startTime).toBe(1_000);
    expect(state.endTime).toBeNull();
    expect(state.isComplete).toBe(false);
    expect(state.getTaskDuration()).toBe(0);
  });

  it('keeps context, related tasks and user inputs across tasks', () => {
    state.startNewTask('first', 'task-1');
    state.updateContext({ repo: 'demo' });
    state.addUserInput('use tabs');
    state.addRelatedTasks([{ taskId: 'old', description: 'x', relevance: 1, completed: true }]);
    state.addMessage('assistant', 'thinking');
    state.addToolResult('echo', { x: 1 }, { success: true, message: 'ok' });
    state.consecutiveAutoApprovals = 2;
    state.markFailed('boom');

    state.startNewTask('second', 'task-2');

    expect(state.context).toEqual({ repo: 'demo' });
    expect(state.userInputs.map((u) => u.content)).toEqual(['use tabs']);
    expect(state.relatedTasks).toHaveLength(1);
    expect(state.messages).toEqual([]);
    expect(state.toolExecutions).toEqual([]);
    expect(state.isFailed).toBe(false);
    expect(state.errorMessage).toBeNull();
    expect(state.consecutiveAutoApprovals).toBe(0);
  });

  it('markFailed also marks the task complete', () => {
    state.startNewTask('t', 'task-1');
    clock = 3_500;
    state.markFailed('Maximum iterations reached');

    expect(state.isComplete).toBe(true);
    expect(state.isFailed).toBe(true);
    expect(state.errorMessage).toBe('Maximum iterations reached');
    expect(state.getTaskDuration()).toBe(2.5);
  });

  it('returns the most recent tool result', () => {
    expect(state.getLastToolResult()).toBeNull();
    state.addToolResult('a', {}, { success: true, message: 'first' });
    state.addToolResult('b', {}, { success: false, message: 'second' });
    expect(state.getLastToolResult()).toEqual({ success: false, message: 'second' });
  });

  it('skips related tasks it already holds', () => {
    const related = { taskId: 'r1', description: 'd', relevance: 0.5, completed: false };
    state.addRelatedTasks([related]);
    state.addRelatedTasks([related, { ...related, taskId: 'r2' }]);
    expect(state.relatedTasks.map((t) => t.taskId)).toEqual(['r1', 'r2']);
  });

  it('counts and resets auto approvals', () => {
    state.incrementAutoApprovals();
    state.incrementAutoApprovals();
    expect(state.consecutiveAutoApprovals).toBe(2);
    state.resetAutoApprovals();
    expect(state.consecutiveAutoApprovals).toBe(0);
  });

  it('snapshots are deep copies that restore exactly', () => {
    state.startNewTask('t', 'task-1');
    state.addMessage('system', 'Starting task: t', { source: 'engine' });
    state.updateContext({ nested: { depth: 1 } });

    const snapshot = state.toSnapshot();
    state.addMessage('assistant', 'later');
    state.updateContext({ extra: true });

    expect(snapshot.messages).toHaveLength(1);
    expect(snapshot.context).toEqual({ nested: { depth: 1 } });

    const restored = TaskState.fromSnapshot(snapshot);
    expect(restored.toSnapshot()).toEqual(snapshot);

    snapshot.messages.push({ role: 'user', content: 'x', metadata: {}, timestamp: 0 });
    expect(restored.messages).toHaveLength(1);
  });
});
