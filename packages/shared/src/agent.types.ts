export type EngineStatus =
  | 'idle'
  | 'thinking'
  | 'acting'
  | 'awaiting_approval'
  | 'paused'
  | 'complete'
  | 'failed';

export interface EngineState {
  status: EngineStatus;
  taskId: string | null;
  iteration: number;
  currentAction: string | null;
}

/** What the oracle decided to do next. */
export interface AgentAction {
  toolName: string | null;
  toolArgs: Record<string, unknown>;
  isComplete: boolean;
  result: string | null;
  thoughts: string;
}
