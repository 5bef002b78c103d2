export type BreakpointKind = 'tool' | 'state' | 'llm';

export interface BreakpointConfig {
  type: BreakpointKind;
  condition?: string | null;
  enabled?: boolean;
}

export interface DebugInfo {
  timestamp: number;
  action: BreakpointKind | 'error';
  details: Record<string, unknown>;
  context: Record<string, unknown>;
}
