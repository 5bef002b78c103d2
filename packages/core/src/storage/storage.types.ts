import type { Checkpoint, RelatedTask, TaskSearchHit, TaskStateSnapshot } from '@stepwise/shared';

/**
 * Persistence contract shared by every backend. Callers must not write the
 * same task id from two engines at once; nothing here locks.
 */
export interface StateStorage {
  /** Upsert; the last write wins. */
  saveState(taskId: string, state: TaskStateSnapshot): Promise<void>;
  loadState(taskId: string): Promise<TaskStateSnapshot | null>;
  /** Snapshot the saved state of `taskId`. Throws NoStateError when nothing was saved. */
  createCheckpoint(taskId: string, description: string): Promise<Checkpoint>;
  /** Overwrites the task's current state with the checkpoint's and returns it. */
  restoreCheckpoint(checkpointId: string): Promise<TaskStateSnapshot>;
  /** Oldest first. */
  listCheckpoints(taskId: string): Promise<Checkpoint[]>;
  searchTaskHistory(query: string, limit?: number): Promise<TaskSearchHit[]>;
  getRelatedTasks(taskId: string, limit?: number): Promise<RelatedTask[]>;
  close(): Promise<void>;
}

export interface StorageOptions {
  /** Clock for checkpoint timestamps. */
  now?: () => number;
}

export class NoStateError extends Error {
  constructor(readonly taskId: string) {
    super(`No state found for task ${taskId}`);
    this.name = 'NoStateError';
  }
}

export class CheckpointNotFoundError extends Error {
  constructor(readonly checkpointId: string) {
    super(`Checkpoint ${checkpointId} not found`);
    this.name = 'CheckpointNotFoundError';
  }
}

/** Raised when a checkpoint could not be written. The engine logs it and carries on. */
export class CheckpointError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CheckpointError';
  }
}
