export type MessageRole = 'system' | 'user' | 'assistant';

export interface TaskMessage {
  role: MessageRole;
  content: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

export interface ToolResult {
  success: boolean;
  message: string;
  data?: unknown;
}

export interface ToolExecutionRecord {
  toolName: string;
  args: Record<string, unknown>;
  result: ToolResult;
  timestamp: number;
}

export interface UserInput {
  content: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

export interface RelatedTask {
  taskId: string;
  description: string;
  relevance: number;
  completed: boolean;
}

/** A history search hit as returned by storage, before it is joined with the task's state. */
export interface TaskSearchHit {
  taskId: string;
  relevance: number;
}

export interface TaskHistoryEntry extends TaskSearchHit {
  task: string;
  completed: boolean;
}

/**
 * Serializable form of a task's state. Every backend stores and returns
 * exactly this shape; timestamps are epoch milliseconds.
 */
export interface TaskStateSnapshot {
  task: string;
  taskId: string;
  messages: TaskMessage[];
  toolExecutions: ToolExecutionRecord[];
  context: Record<string, unknown>;
  relatedTasks: RelatedTask[];
  userInputs: UserInput[];
  isComplete: boolean;
  isFailed: boolean;
  errorMessage: string | null;
  startTime: number | null;
  endTime: number | null;
  consecutiveAutoApprovals: number;
}
