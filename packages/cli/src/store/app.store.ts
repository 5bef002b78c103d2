import { useReducer } from 'react';
import type { DebugInfo, EngineState, TaskMessage, ToolExecutionRecord } from '@stepwise/shared';
import type { PendingApproval } from '../engine.bridge.js';
import type { AppAction } from './app.actions.js';

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export type AppPhase =
  | 'idle' // Ready for a task
  | 'running' // Engine loop in progress
  | 'completed'; // Last task finished, ready for the next

export interface AppState {
  phase: AppPhase;
  engine: EngineState | null;
  /** Recent engine messages, newest last. */
  recentMessages: TaskMessage[];
  /** Recent tool executions, newest last. */
  recentTools: ToolExecutionRecord[];
  approval: PendingApproval | null;
  breakpoint: DebugInfo | null;
  /** UI message log. */
  messages: string[];
  slashOutput: string | null;
}

export const MAX_LOG_LINES = 10;
export const MAX_RECENT_MESSAGES = 6;
export const MAX_RECENT_TOOLS = 5;

export const initialAppState: AppState = {
  phase: 'idle',
  engine: null,
  recentMessages: [],
  recentTools: [],
  approval: null,
  breakpoint: null,
  messages: [],
  slashOutput: null,
};

function pushCapped<T>(items: T[], item: T, max: number): T[] {
  return [...items.slice(-(max - 1)), item];
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function appReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case 'TASK_STARTED':
      return {
        ...state,
        phase: 'running',
        recentMessages: [],
        recentTools: [],
        slashOutput: null,
        messages: pushCapped(state.messages, `> ${action.task}`, MAX_LOG_LINES),
      };

    case 'TASK_FINISHED':
      return {
        ...state,
        phase: 'completed',
        approval: null,
        breakpoint: null,
        messages: pushCapped(state.messages, action.message, MAX_LOG_LINES),
      };

    case 'ENGINE_STATUS':
      return { ...state, engine: action.state };

    case 'ENGINE_MESSAGE':
      return {
        ...state,
        recentMessages: pushCapped(state.recentMessages, action.message, MAX_RECENT_MESSAGES),
      };

    case 'TOOL_EXECUTED':
      return {
        ...state,
        recentTools: pushCapped(state.recentTools, action.record, MAX_RECENT_TOOLS),
      };

    case 'APPROVAL':
      return { ...state, approval: action.pending };

    case 'BREAK':
      return { ...state, breakpoint: action.info };

    case 'ADD_MESSAGE':
      return { ...state, messages: pushCapped(state.messages, action.message, MAX_LOG_LINES) };

    case 'CLEAR_MESSAGES':
      return { ...state, messages: [], slashOutput: null };

    case 'SET_SLASH_OUTPUT':
      return { ...state, slashOutput: action.output };

    default:
      return state;
  }
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

export function useAppStore(): [AppState, React.Dispatch<AppAction>] {
  return useReducer(appReducer, initialAppState);
}
