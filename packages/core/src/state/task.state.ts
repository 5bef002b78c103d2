import type {
  MessageRole,
  RelatedTask,
  TaskMessage,
  TaskStateSnapshot,
  ToolExecutionRecord,
  ToolResult,
  UserInput,
} from '@stepwise/shared';

/**
 * Mutable record of one task run. An engine owns a single instance and resets
 * it for every task; context, related tasks and user inputs survive the reset.
 */
export class TaskState {
  task = '';
  taskId = '';
  messages: TaskMessage[] = [];
  toolExecutions: ToolExecutionRecord[] = [];
  context: Record<string, unknown> = {};
  relatedTasks: RelatedTask[] = [];
  userInputs: UserInput[] = [];
  isComplete = false;
  isFailed = false;
  errorMessage: string | null = null;
  startTime: number | null = null;
  endTime: number | null = null;
  consecutiveAutoApprovals = 0;

  constructor(private readonly now: () => number = Date.now) {}

  startNewTask(task: string, taskId: string): void {
    this.task = task;
    this.taskId = taskId;
    this.messages = [];
    this.toolExecutions = [];
    this.isComplete = false;
    this.isFailed = false;
    this.errorMessage = null;
    this.startTime = this.now();
    this.endTime = null;
    this.consecutiveAutoApprovals = 0;
  }

  addMessage(
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {},
  ): TaskMessage {
    const message: TaskMessage = { role, content, metadata, timestamp: this.now() };
    this.messages.push(message);
    return message;
  }

  addUserInput(content: string, metadata: Record<string, unknown> = {}): UserInput {
    const input: UserInput = { content, metadata, timestamp: this.now() };
    this.userInputs.push(input);
    return input;
  }

  addToolResult(
    toolName: string,
    args: Record<string, unknown>,
    result: ToolResult,
  ): ToolExecutionRecord {
    const record: ToolExecutionRecord = { toolName, args, result, timestamp: this.now() };
    this.toolExecutions.push(record);
    return record;
  }

  updateContext(updates: Record<string, unknown>): void {
    Object.assign(this.context, updates);
  }

  /** Append related tasks not already known, by task id. */
  addRelatedTasks(tasks: RelatedTask[]): void {
    const known = new Set(this.relatedTasks.map((t) => t.taskId));
    for (const task of tasks) {
      if (known.has(task.taskId)) continue;
      known.add(task.taskId);
      this.relatedTasks.push(task);
    }
  }

  markComplete(): void {
    this.isComplete = true;
    this.endTime = this.now();
  }

  /** A failed task is also complete. */
  markFailed(errorMessage: string): void {
    this.isComplete = true;
    this.isFailed = true;
    this.errorMessage = errorMessage;
    this.endTime = this.now();
  }

  getLastToolResult(): ToolResult | null {
    return this.toolExecutions.at(-1)?.result ?? null;
  }

  /** Duration in seconds, or null before the task started. */
  getTaskDuration(): number | null {
    if (this.startTime === null) return null;
    const end = this.endTime ?? this.now();
    return (end - this.startTime) / 1000;
  }

  resetAutoApprovals(): void {
    this.consecutiveAutoApprovals = 0;
  }

  incrementAutoApprovals(): void {
    this.consecutiveAutoApprovals++;
  }

  toSnapshot(): TaskStateSnapshot {
    return structuredClone({
      task: this.task,
      taskId: this.taskId,
      messages: this.messages,
      toolExecutions: this.toolExecutions,
      context: this.context,
      relatedTasks: this.relatedTasks,
      userInputs: this.userInputs,
      isComplete: this.isComplete,
      isFailed: this.isFailed,
      errorMessage: this.errorMessage,
      startTime: this.startTime,
      endTime: this.endTime,
      consecutiveAutoApprovals: this.consecutiveAutoApprovals,
    });
  }

  /** Replace every field with a copy of the snapshot's. */
  restore(snapshot: TaskStateSnapshot): void {
    const copy = structuredClone(snapshot);
    this.task = copy.task;
    this.taskId = copy.taskId;
    this.messages = copy.messages;
    this.toolExecutions = copy.toolExecutions;
    this.context = copy.context;
    this.relatedTasks = copy.relatedTasks;
    this.userInputs = copy.userInputs;
    this.isComplete = copy.isComplete;
    this.isFailed = copy.isFailed;
    this.errorMessage = copy.errorMessage;
    this.startTime = copy.startTime;
    this.endTime = copy.endTime;
    this.consecutiveAutoApprovals = copy.consecutiveAutoApprovals;
  }

  static fromSnapshot(snapshot: TaskStateSnapshot, now?: () => number): TaskState {
    const state = new TaskState(now);
    state.restore(snapshot);
    return state;
  }
}
