import type { TaskMessage, TaskStateSnapshot } from '@stepwise/shared';

/** Snapshot builder shared by the storage suites. */
export function makeSnapshot(
  taskId: string,
  overrides: Partial<TaskStateSnapshot> = {},
): TaskStateSnapshot {
  return {
    task: `task ${taskId}`,
    taskId,
    messages: [],
    toolExecutions: [],
    context: {},
    relatedTasks: [],
    userInputs: [],
    isComplete: false,
    isFailed: false,
    errorMessage: null,
    startTime: 1_000,
    endTime: null,
    consecutiveAutoApprovals: 0,
    ...overrides,
  };
}

export function message(content: string, role: TaskMessage['role'] = 'assistant'): TaskMessage {
  return { role, content, metadata: {}, timestamp: 2_000 };
}
