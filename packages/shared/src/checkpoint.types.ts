import type { TaskStateSnapshot } from './task.types.js';

export interface Checkpoint {
  id: string;
  timestamp: number;
  taskId: string;
  description: string;
  state: TaskStateSnapshot;
  /** Previous checkpoint of the same task, or null for the first one. */
  parentId: string | null;
}
