import type { DebugInfo, EngineState, TaskMessage, ToolExecutionRecord } from '@stepwise/shared';
import type { PendingApproval } from '../engine.bridge.js';

// ---------------------------------------------------------------------------
// Action Types
// ---------------------------------------------------------------------------

export type AppAction =
  | { type: 'TASK_STARTED'; task: string }
  | { type: 'TASK_FINISHED'; message: string }
  | { type: 'ENGINE_STATUS'; state: EngineState }
  | { type: 'ENGINE_MESSAGE'; message: TaskMessage }
  | { type: 'TOOL_EXECUTED'; record: ToolExecutionRecord }
  | { type: 'APPROVAL'; pending: PendingApproval | null }
  | { type: 'BREAK'; info: DebugInfo | null }
  | { type: 'ADD_MESSAGE'; message: string }
  | { type: 'CLEAR_MESSAGES' }
  | { type: 'SET_SLASH_OUTPUT'; output: string | null };
